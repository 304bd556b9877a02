import { describe, it, expect } from "vitest";
import { segmentUtterance } from "../src/segmentation/clauses.js";

const texts = (text: string, protectedPhrases?: string[]) =>
  segmentUtterance(text, { protectedPhrases }).map((c) => c.text);

describe("segmentUtterance", () => {
  it("splits on sentences, commas and conjunctions", () => {
    expect(texts("I ran 3 miles, did yoga. Then I meditated")).toEqual(["I ran 3 miles", "did yoga", "I meditated"]);
  });

  it("does not treat a decimal point as a sentence break", () => {
    expect(texts("I ran 1.5 miles. Did yoga")).toEqual(["I ran 1.5 miles", "Did yoga"]);
  });

  it("treats a comma before a conjunction as one separator", () => {
    expect(texts("did yoga, and then meditated")).toEqual(["did yoga", "meditated"]);
  });

  it("splits on as well as", () => {
    expect(texts("read a chapter as well as journaled")).toEqual(["read a chapter", "journaled"]);
  });

  it("keeps compound measurements together", () => {
    expect(texts("worked out for 1 hour and 30 minutes")).toEqual(["worked out for 1 hour and 30 minutes"]);
  });

  it("splits measurements of different unit families", () => {
    expect(texts("did pushups for 30 minutes and 2 sets")).toEqual(["did pushups for 30 minutes", "2 sets"]);
  });

  it("keeps fractions together", () => {
    expect(texts("ran two and a half miles")).toEqual(["ran two and a half miles"]);
    expect(texts("meditated for an hour and a half")).toEqual(["meditated for an hour and a half"]);
    expect(texts("meditated 2 hours and a half, then read")).toEqual(["meditated 2 hours and a half", "read"]);
  });

  it("does not split thousands separators", () => {
    expect(texts("walked 10,000 steps, did yoga")).toEqual(["walked 10,000 steps", "did yoga"]);
  });

  it("keeps protected phrases together", () => {
    expect(texts("ate salt and vinegar chips", ["salt and vinegar"])).toEqual(["ate salt and vinegar chips"]);
    expect(texts("ate salt and vinegar chips")).toEqual(["ate salt", "vinegar chips"]);
  });

  it("attaches filler-only pieces to a neighbouring clause", () => {
    expect(texts("this morning, I did yoga")).toEqual(["this morning, I did yoga"]);
    expect(texts("did yoga, this morning")).toEqual(["did yoga, this morning"]);
  });

  it("records offsets into the utterance", () => {
    const [, second] = segmentUtterance("did yoga and ran");
    expect(second).toMatchObject({ text: "ran", start: 13, end: 16 });
    expect(second.tokens.map((t) => t.start)).toEqual([13]);
  });

  it("returns nothing for punctuation only", () => {
    expect(segmentUtterance("... !")).toEqual([]);
  });
});
