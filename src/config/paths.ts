import { homedir } from "node:os";
import { join, resolve } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.dlive-vod/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".dlive-vod");
export const CONFIG_FILE = join(APP_DIR, "config.json");

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}

/**
 * Absolute form of a user-supplied output directory.
 */
export function resolveOutputDir(path: string): string {
  return resolve(expandPath(path));
}
