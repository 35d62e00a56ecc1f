import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

/**
 * True when `moduleUrl` is the script node was started with. npm links bins
 * as symlinks while node loads the resolved file, so compare real paths.
 */
export function isMainModule(moduleUrl: string, argv1: string | undefined = process.argv[1]): boolean {
  if (!argv1) return false;
  return moduleUrl === pathToFileURL(realpathSync(argv1)).href;
}
