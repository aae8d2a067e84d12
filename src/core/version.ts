/** Engine version; part of every cache artifact name and frozen header. */
export const ENGINE_VERSION = '1.2.0';

/** Runtime identifier used in cache artifact names, e.g. `node20.11`. */
export function runtimeId(versions: NodeJS.ProcessVersions = process.versions): string {
  const [major = '0', minor = '0'] = versions.node.split('.');
  return `node${major}.${minor}`;
}
