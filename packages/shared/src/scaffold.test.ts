import { resolve } from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { getPkgRoot, readPackageJson } from "./scaffold-helpers.js";

const pkgRoot = getPkgRoot(import.meta.url);
const monorepoRoot = resolve(pkgRoot, "../..");

const PACKAGES = ["shared", "core", "rest-api"] as const;

describe("monorepo structure", () => {
  it("lists every package as a workspace", () => {
    const rootJson = readPackageJson(monorepoRoot);
    expect(rootJson.workspaces).toEqual(PACKAGES.map((pkg) => `packages/${pkg}`));
  });

  for (const pkg of PACKAGES) {
    describe(pkg, () => {
      let pkgJson: Record<string, unknown>;

      beforeAll(() => {
        pkgJson = readPackageJson(resolve(monorepoRoot, "packages", pkg));
      });

      it("is named under the @keyshift scope", () => {
        expect(pkgJson.name).toBe(`@keyshift/${pkg}`);
      });

      it('has "type": "module"', () => {
        expect(pkgJson.type).toBe("module");
      });

      it("exposes its TypeScript sources to the type checker", () => {
        const exports = pkgJson.exports as Record<string, Record<string, string>>;
        expect(exports["."]?.types).toBe("./src/index.ts");
        expect(exports["."]?.default).toBe("./dist/index.js");
        expect(pkgJson.types).toBe("./src/index.ts");
      });

      it('has "build" script', () => {
        const scripts = pkgJson.scripts as Record<string, string>;
        expect(scripts.build).toBe("tsc -b");
      });
    });
  }
});

describe("bin entries", () => {
  it('rest-api declares "keyshift-server" bin', () => {
    const pkgJson = readPackageJson(resolve(monorepoRoot, "packages", "rest-api"));
    const bin = pkgJson.bin as Record<string, string>;
    expect(bin["keyshift-server"]).toBe("./dist/main.js");
  });
});
