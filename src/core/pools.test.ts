import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadValuePools } from "./pools.js";

describe("loadValuePools", () => {
  it("loads the bundled pools", async () => {
    const pools = await loadValuePools();

    expect(pools.firstNames).toHaveLength(20);
    expect(pools.lastNames).toHaveLength(20);
    expect(pools.medicalHistories).toHaveLength(10);
  });

  it("rejects a name pool of the wrong size", async () => {
    const dir = await mkdtemp(join(tmpdir(), "careseed-"));
    const file = join(dir, "pools.json");
    await writeFile(
      file,
      JSON.stringify({
        firstNames: ["Ada"],
        lastNames: ["Lovelace"],
        medicalHistories: ["None"],
      }),
    );

    await expect(loadValuePools(file)).rejects.toThrow(`Invalid value pools in ${file}`);
  });
});
