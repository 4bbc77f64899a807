import { describe, it, expect } from "vitest";
import { TextIndex } from "../rag/text-index";
import { createDocument } from "../docs/types";

const installDoc = createDocument("install.md", "How to install the package. Run npm install.");
const usageDoc = createDocument("usage.md", "Usage examples for the client.");
const faqDoc = createDocument("faq.md", "Can I install offline? Yes.");

describe("TextIndex", () => {
  const index = TextIndex.build([installDoc, usageDoc, faqDoc]);

  it("ranks documents by relevance", () => {
    expect(index.search("install")).toEqual([installDoc, faqDoc]);
  });

  it("caps results at k", () => {
    expect(index.search("install", 1)).toEqual([installDoc]);
  });

  it("rounds a fractional k down", () => {
    expect(index.search("install", 1.7)).toEqual([installDoc]);
  });

  it("returns every match when k exceeds the collection", () => {
    expect(index.search("install", 50)).toHaveLength(2);
  });

  it("returns nothing for k <= 0", () => {
    expect(index.search("install", 0)).toEqual([]);
    expect(index.search("install", -3)).toEqual([]);
  });

  it("returns nothing for a blank query", () => {
    expect(index.search("   ")).toEqual([]);
  });

  it("returns nothing when no term matches", () => {
    expect(index.search("kubernetes")).toEqual([]);
  });

  it("searches filenames", () => {
    const withName = TextIndex.build([
      createDocument("deployment.md", "Nothing of note."),
      usageDoc,
    ]);
    expect(withName.search("deployment").map((doc) => doc.filename)).toEqual(["deployment.md"]);
  });

  it("keeps collection order for equal scores", () => {
    const x = createDocument("x.md", "alpha beta");
    const y = createDocument("y.md", "alpha beta");

    expect(TextIndex.build([x, y]).search("alpha")).toEqual([x, y]);
    expect(TextIndex.build([y, x]).search("alpha")).toEqual([y, x]);
  });

  it("handles an empty collection", () => {
    const empty = TextIndex.build([]);
    expect(empty.size).toBe(0);
    expect(empty.search("anything")).toEqual([]);
  });

  it("returns the stored document objects", () => {
    expect(index.search("usage")[0]).toBe(usageDoc);
    expect(index.size).toBe(3);
  });

  it("is not affected by later changes to the input array", () => {
    const docs = [usageDoc];
    const snapshot = TextIndex.build(docs);
    docs.push(installDoc);

    expect(snapshot.size).toBe(1);
    expect(snapshot.search("install")).toEqual([]);
  });
});
