import { pathToFileURL } from 'node:url';

/**
 * Whether the module at `moduleUrl` is the script Node was started with,
 * rather than one imported by it (or by a test).
 *
 * @param moduleUrl - The caller's `import.meta.url`
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const scriptPath = process.argv[1];
  if (scriptPath === undefined) {
    return false;
  }
  return moduleUrl === pathToFileURL(scriptPath).href;
}
