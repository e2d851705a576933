import { describe, it, expect } from "vitest";
import { ArchiveAssembler, type AssemblyPlan } from "../app/lib/epub/archive";
import { resolveOptions } from "../app/lib/epub/config";
import { buildNavTree } from "../app/lib/epub/nav-tree";
import { chapterSource, paragraph, type BookData } from "../app/lib/epub/types";
import { ArchiveStateError } from "../app/lib/errors";

function plan(data: BookData): AssemblyPlan {
  return {
    data,
    tree: buildNavTree(data.prefaces ?? [], data.chapters ?? [], false),
    options: resolveOptions({ language: "en" }, {}),
    identifier: "test-id",
    modified: "2024-01-01T00:00:00Z",
    entryDate: new Date("2024-01-01T00:00:00Z"),
  };
}

const book: BookData = {
  chapters: [{ title: "One", source: chapterSource(() => ({ elements: [paragraph("x")] })) }],
};

describe("ArchiveAssembler", () => {
  it("should start in the opened state", () => {
    expect(new ArchiveAssembler(plan(book)).state).toBe("opened");
  });

  it("should reject steps out of order", async () => {
    const assembler = new ArchiveAssembler(plan(book));

    await expect(assembler.writeNavigation()).rejects.toThrow(ArchiveStateError);
    await expect(assembler.writeNavigation()).rejects.toThrow(
      'Archive is in state "opened", expected "mimetype-written"',
    );
    expect(assembler.state).toBe("opened");

    await assembler.writeMimetype();
    expect(assembler.state).toBe("mimetype-written");
    expect(assembler.entryNames).toEqual(["mimetype"]);
    await expect(assembler.writeMimetype()).rejects.toThrow(ArchiveStateError);
  });

  it("should walk every state when assembling", async () => {
    const assembler = new ArchiveAssembler(plan(book));
    const buffer = await assembler.assemble();

    expect(buffer.length).toBeGreaterThan(0);
    expect(assembler.state).toBe("closed");
    await expect(assembler.close()).rejects.toThrow(ArchiveStateError);
  });

  it("should move to failed when a chapter cannot be produced", async () => {
    const broken: BookData = {
      chapters: [
        {
          title: "Broken",
          source: chapterSource(() => {
            throw new Error("producer failed");
          }),
        },
      ],
    };
    const assembler = new ArchiveAssembler(plan(broken));
    await assembler.writeMimetype();
    await assembler.writeNavigation();

    await expect(assembler.writeChapters()).rejects.toThrow("producer failed");
    expect(assembler.state).toBe("failed");
    await expect(assembler.writeManifest()).rejects.toThrow(
      'Archive is in state "failed", expected "chapters-written"',
    );
  });
});
