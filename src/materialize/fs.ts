import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

/** Filesystem capability, rooted at the output directory. Paths are project-relative. */
export interface ProjectFs {
  /** Write a file, creating intermediate directories. */
  write(path: string, content: string): void;
  exists(path: string): boolean;
  /** Entry names directly under `path`, sorted. Empty when the directory does not exist. */
  listChildren(path: string): string[];
}

export function createNodeFs(root: string): ProjectFs {
  const abs = (path: string): string => resolve(root, path);

  return {
    write(path, content) {
      const target = abs(path);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content, "utf-8");
    },
    exists(path) {
      return existsSync(abs(path));
    },
    listChildren(path) {
      try {
        return readdirSync(abs(path)).sort();
      } catch (err) {
        if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
          return [];
        }
        throw err;
      }
    },
  };
}

/** Reads go to `base`; writes are dropped. */
export function createDryRunFs(base: ProjectFs): ProjectFs {
  return {
    write() {},
    exists: (path) => base.exists(path),
    listChildren: (path) => base.listChildren(path),
  };
}
