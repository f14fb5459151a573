/**
 * Shared test helpers for scaffold.test.ts files across all packages.
 * Excluded from the build via tsconfig.json; test-time only.
 */
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

/** Resolve the package root directory from `import.meta.url` of the caller. */
export function getPkgRoot(importMetaUrl: string): string {
  return resolve(dirname(fileURLToPath(importMetaUrl)), "..");
}

export function readPackageJson(pkgRoot: string): Record<string, unknown> {
  const raw = readFileSync(resolve(pkgRoot, "package.json"), "utf-8");
  return JSON.parse(raw) as Record<string, unknown>;
}

/** Assert that each specifier can be dynamically imported (cross-package wiring). */
export function describeCrossPackageImports(specifiers: string[]): void {
  describe("cross-package imports", () => {
    for (const specifier of specifiers) {
      it(`can import ${specifier}`, async () => {
        const mod: unknown = await import(specifier);
        expect(mod).toBeDefined();
      });
    }
  });
}

/** Assert that each dep is declared as a workspace dependency ("*"). */
export function describeWorkspaceDeps(pkgRoot: string, deps: string[]): void {
  describe("workspace dependencies", () => {
    for (const dep of deps) {
      it(`declares ${dep} as "*"`, () => {
        const pkgJson = readPackageJson(pkgRoot);
        expect(pkgJson.dependencies).toBeDefined();
        const dependencies = pkgJson.dependencies as Record<string, string>;
        expect(dependencies[dep]).toBe("*");
      });
    }
  });
}
