import { readdir, stat } from "fs/promises";
import { dirname, extname, join } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import type { Router } from "./types.js";

const MODULE_EXTENSIONS = new Set([".ts", ".mts", ".js", ".mjs"]);

export function isRouter(value: unknown): value is Router {
  return typeof value === "object" && value !== null && "route" in value && typeof value.route === "function";
}

function isModuleFile(name: string): boolean {
  if (/\.d\.[mc]?ts$/.test(name)) return false;
  if (/\.(test|spec)\.[mc]?[jt]s$/.test(name)) return false;
  return MODULE_EXTENSIONS.has(extname(name));
}

interface ScanRoot {
  dir: string;
  /** Module discovery started from; never imported */
  caller: string | null;
}

async function resolveRoot(from: string | URL): Promise<ScanRoot> {
  const path = from instanceof URL || from.startsWith("file:") ? fileURLToPath(from) : from;
  const info = await stat(path);
  return info.isDirectory() ? { dir: path, caller: null } : { dir: dirname(path), caller: path };
}

async function listModules(dir: string, caller: string | null): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === "node_modules" || entry.name.startsWith(".")) continue;
      files.push(...(await listModules(path, caller)));
    } else if (entry.isFile() && isModuleFile(entry.name) && path !== caller) {
      files.push(path);
    }
  }
  return files;
}

/**
 * Find router objects exported by the modules in the directory of `from`
 * and every directory below it.
 *
 * When `from` is a module, that module itself is not imported: routers it
 * declares go in the `routers` option.
 *
 * @param from - a module URL (`import.meta.url`) or a directory path
 */
export async function discoverRouters(from: string | URL): Promise<Router[]> {
  const { dir, caller } = await resolveRoot(from);
  const routers: Router[] = [];

  for (const file of await listModules(dir, caller)) {
    const exported: Record<string, unknown> = await import(pathToFileURL(file).href);
    for (const value of Object.values(exported)) {
      if (isRouter(value) && !routers.includes(value)) {
        routers.push(value);
      }
    }
  }

  return routers;
}
