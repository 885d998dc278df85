import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, realpath, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { archiveSource } from "../../src/notes/index.js";
import { PathSandbox } from "../../src/sandbox/index.js";

const diskFull = vi.hoisted(() => ({ enabled: false }));

// Once enabled, writeFile stores the first half of the data and then fails the way a full disk does.
vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    writeFile: async (...args: Parameters<typeof actual.writeFile>): Promise<void> => {
      if (!diskFull.enabled) return actual.writeFile(...args);
      const [file, data] = args;
      if (data instanceof Uint8Array) {
        await actual.writeFile(file, data.subarray(0, Math.floor(data.byteLength / 2)));
      }
      throw Object.assign(new Error("ENOSPC: no space left on device"), { code: "ENOSPC" });
    },
  };
});

describe("archiveSource on a failing disk", () => {
  const encoder = new TextEncoder();
  let tempDir = "";
  let copyRoot = "";
  let sandbox: PathSandbox;

  beforeEach(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), "note-maker-archive-")));
    copyRoot = join(tempDir, "copy");
    await mkdir(copyRoot);
    sandbox = new PathSandbox({ copy: copyRoot });
  });

  afterEach(async () => {
    diskFull.enabled = false;
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  it("leaves no partial copy behind and keeps the name free", async () => {
    const source = { fileName: "Intro.pptx", bytes: encoder.encode("0123456789") };

    diskFull.enabled = true;
    await expect(archiveSource(sandbox, "", source)).rejects.toMatchObject({
      kind: "WriteFailed",
      message: "Could not archive Intro.pptx.",
    });
    await expect(readdir(copyRoot)).resolves.toEqual([]);

    diskFull.enabled = false;
    await expect(archiveSource(sandbox, "", source)).resolves.toBe(join(copyRoot, "Intro.pptx"));
    await expect(readFile(join(copyRoot, "Intro.pptx"), "utf8")).resolves.toBe("0123456789");
    await expect(readdir(copyRoot)).resolves.toEqual(["Intro.pptx"]);
  });
});
