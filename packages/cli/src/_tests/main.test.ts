import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { main, type Io } from "../main";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const io: Io = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
  return { io, stdout: () => out.join(""), stderr: () => err.join("") };
}

describe("main", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "bitfit-cli-"));
    await writeFile(
      join(dir, "pairs.json"),
      JSON.stringify({
        name: "pairs",
        identifiers: ["ab", "ba", "aa"],
        descriptions: ["A then B", "B then A", "Double A"],
      })
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("help prints usage and exits 0", async () => {
    const { io, stdout } = capture();
    expect(await main(["help"], io)).toBe(0);
    expect(stdout()).toContain("Usage:\n  bitfit [command] [options]");
  });

  test("a usage error exits 2 and explains itself on stderr", async () => {
    const { io, stdout, stderr } = capture();
    expect(await main(["frobnicate"], io)).toBe(2);
    expect(stderr().startsWith("Unknown command: frobnicate\n")).toBe(true);
    expect(stdout()).toBe("");
  });

  test("encodes strings with the bundled vocabulary's code", async () => {
    const { io, stdout } = capture();
    expect(await main(["encode", "lck", "Pltog", "--budget", "16"], io)).toBe(0);
    expect(stdout()).toBe(
      [
        "========== ENCODED COMMANDS ==========",
        "Idx  Command  Bit string             Bits  Bytes  OK/OVER",
        "---------------------------------------------------------",
        "0    lck      010111010001             12      2  OK",
        "1    Pltog    011001010010000111011    21      3  OVER",
        "",
        "========== TARGET 16 BITS / 2 BYTES ==========",
        "Per command:  min 12 bits (2 byte(s)), max 21 bits (3 byte(s))",
        "Average:      16.50 bits, 2.06 bytes",
        "Entries:      1 OK, 1 OVER, 0 failed",
        "",
      ].join("\n")
    );
  });

  test("--strict exits 1 when an entry does not fit", async () => {
    const { io } = capture();
    expect(await main(["encode", "Pltog", "--budget", "16", "--strict"], io)).toBe(1);
  });

  test("--strict passes for the bundled vocabulary at 32 bits", async () => {
    const { io, stdout } = capture();
    expect(await main(["report", "--strict"], io)).toBe(0);
    expect(stdout()).toContain("Entries:      48 OK, 0 OVER, 0 failed");
  });

  test("--json prints the analysis as JSON", async () => {
    const { io, stdout } = capture();
    expect(await main(["--json"], io)).toBe(0);

    const parsed: unknown = JSON.parse(stdout());
    expect(parsed).toMatchObject({
      vocabulary: "vehicle-control-commands",
      condition: "normal",
      targetBits: 32,
      summary: { entries: 48, ok: 48, over: 0, failed: 0 },
    });
  });

  test("loads vocabularies matching --vocab", async () => {
    const { io, stdout } = capture();
    expect(await main(["--vocab", join(dir, "*.json")], io)).toBe(0);
    expect(stdout()).toContain("0    ab       10             2      1  OK\n");
    expect(stdout()).toContain("aa     Double A\n");
  });

  test("compares case folding", async () => {
    const { io, stdout } = capture();
    expect(await main(["compare"], io)).toBe(0);
    expect(stdout()).toContain(
      "Mixed case: 40 distinct chars; min 12, max 32, total 1184, average 24.67 bits\n"
    );
    expect(stdout()).toContain(
      "Lower case: 24 distinct chars; min 10, max 29, total 1006, average 20.96 bits\n"
    );
  });

  test("a glob with no matches exits 1", async () => {
    const { io, stderr } = capture();
    const pattern = join(dir, "missing-*.json");
    expect(await main(["--vocab", pattern], io)).toBe(1);
    expect(stderr()).toBe(`${pattern}: no vocabulary files match\n`);
  });
});
