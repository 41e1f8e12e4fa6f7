import { describe, it } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const PackageJson = z.object({ scripts: z.object({ test: z.string() }) });

function testFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...testFiles(full));
    else if (entry.name.endsWith(".test.ts")) out.push(path.relative(process.cwd(), full).split(path.sep).join("/"));
  }
  return out;
}

// node:test on Node 20 takes no globs, so the npm test script names each file.
describe("npm test script", () => {
  it("lists every test file under src", () => {
    const pkg = PackageJson.parse(JSON.parse(fs.readFileSync(path.resolve(process.cwd(), "package.json"), "utf8")));
    const listed = new Set(pkg.scripts.test.split(/\s+/));
    const missing = testFiles(path.resolve(process.cwd(), "src")).filter(f => !listed.has(f));
    assert.deepStrictEqual(missing, []);
  });
});
