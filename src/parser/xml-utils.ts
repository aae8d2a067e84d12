import type { XmlNode } from './xml-ast.js';

/** First direct child called `name`. */
export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node?.children.find((child) => child.name === name);
}

/** Every direct child called `name`, in document order. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  return node?.children.filter((child) => child.name === name) ?? [];
}

export function hasChild(node: XmlNode | undefined, name: string): boolean {
  return firstChild(node, name) !== undefined;
}

/** Trimmed text content; whitespace-only and missing nodes give `undefined`. */
export function textOf(node: XmlNode | undefined): string | undefined {
  const text = node?.text.trim();
  return text ? text : undefined;
}

/** `textOf(firstChild(node, name))`, the common `<divisions>4</divisions>` lookup. */
export function childText(node: XmlNode | undefined, name: string): string | undefined {
  return textOf(firstChild(node, name));
}

export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** Leading base-10 integer of `value` (`"3"`, `"3a"`); `undefined` when there is none. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  return finiteOrUndefined(value === undefined ? Number.NaN : Number.parseInt(value, 10));
}

/** Leading decimal number of `value` (`"-0.5"`, `"1e2"`); `undefined` when there is none. */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  return finiteOrUndefined(value === undefined ? Number.NaN : Number.parseFloat(value));
}

function finiteOrUndefined(parsed: number): number | undefined {
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** `yes`/`no` attribute values; anything else is `undefined`. */
export function parseYesNo(value: string | undefined): boolean | undefined {
  return value === 'yes' ? true : value === 'no' ? false : undefined;
}
