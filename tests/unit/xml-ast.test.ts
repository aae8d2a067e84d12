import { describe, expect, it } from 'vitest';

import { XmlParseError } from '../../src/core/errors.js';
import { parseXmlDocument, parseXmlToAst } from '../../src/parser/xml-ast.js';

describe('xml AST builder', () => {
  it('builds element paths with sibling indexes', () => {
    const ast = parseXmlToAst('<root><child /><child><inner /></child></root>');

    expect(ast.path).toBe('/root[1]');
    expect(ast.children[0]?.path).toBe('/root[1]/child[1]');
    expect(ast.children[1]?.path).toBe('/root[1]/child[2]');
    expect(ast.children[1]?.children[0]?.path).toBe('/root[1]/child[2]/inner[1]');
  });

  it('keeps the declared encoding and the doctype', () => {
    const document = parseXmlDocument(
      '<?xml version="1.0" encoding="ISO-8859-1"?>\n<!DOCTYPE score-partwise PUBLIC "-//Test//DTD" "test.dtd">\n<score-partwise/>'
    );

    expect(document.declaredEncoding).toBe('ISO-8859-1');
    expect(document.doctype).toBe('score-partwise PUBLIC "-//Test//DTD" "test.dtd"');
    expect(document.root.name).toBe('score-partwise');
  });

  it('drops namespace prefixes from element names', () => {
    const ast = parseXmlToAst('<m:root xmlns:m="urn:test"><m:leaf>text</m:leaf></m:root>');

    expect(ast.name).toBe('root');
    expect(ast.children[0]?.name).toBe('leaf');
    expect(ast.children[0]?.text).toBe('text');
  });

  it('throws an XmlParseError with a location for malformed XML', () => {
    expect(() => parseXmlToAst('<root><a></root>', 'broken.xml')).toThrow(XmlParseError);

    try {
      parseXmlToAst('<root>\n<a></root>', 'broken.xml');
    } catch (error) {
      expect(error).toBeInstanceOf(XmlParseError);
      expect(error instanceof XmlParseError ? error.source?.name : undefined).toBe('broken.xml');
      expect(error instanceof XmlParseError ? error.source?.line : undefined).toBe(2);
    }
  });
});
