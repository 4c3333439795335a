import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function findPackageRoot(startDir: string): string {
    let current = path.resolve(startDir);
    while (true) {
        if (fs.existsSync(path.join(current, "package.json"))) {
            return current;
        }
        const parent = path.dirname(current);
        if (parent === current) {
            throw new Error(`No package.json found above ${startDir}`);
        }
        current = parent;
    }
}

/** Same answer from src/ under a TypeScript loader and from the compiled dist/. */
export const projectRoot = findPackageRoot(__dirname);
export const templatesPath = path.join(projectRoot, "templates");
export const playerEntryPath = path.join(projectRoot, "src", "player", "main.ts");

/**
 * Resolves `name` inside `base`, or returns undefined when it would land
 * outside of it.
 */
export function resolveInside(base: string, name: string): string | undefined {
    const root = path.resolve(base);
    const target = path.resolve(root, name);
    if (target === root || !target.startsWith(root + path.sep)) {
        return undefined;
    }
    return target;
}
