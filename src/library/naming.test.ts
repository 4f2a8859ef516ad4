import { describe, it, expect } from "vitest";
import {
  detectLabel,
  extensionOf,
  stemOf,
  hasInstrumentSuffix,
  stripInstrumentSuffix,
  shortLabel,
  TUNE_STEM_PATTERN,
  SECTION_FOLDER_PATTERN,
} from "./naming.js";
import { INSTRUMENTS } from "./types.js";

describe("detectLabel", () => {
  it("finds phrase regardless of case", () => {
    expect(detectLabel("Set01a_phrase1.pdf")).toBe("phrase");
    expect(detectLabel("PHRASE_01.wav")).toBe("phrase");
  });

  it("finds line", () => {
    expect(detectLabel("line_02.pdf")).toBe("line");
  });

  it("finds part", () => {
    expect(detectLabel("bass_part_A.wav")).toBe("part");
  });

  it("returns null without a keyword", () => {
    expect(detectLabel("random_file.pdf")).toBeNull();
  });

  it("prefers line over part when both appear", () => {
    expect(detectLabel("part 2 line 1.pdf")).toBe("line");
  });
});

describe("extensionOf / stemOf", () => {
  it("splits on the last dot", () => {
    expect(extensionOf("Set 01a - March.v2.PDF")).toBe("pdf");
    expect(stemOf("Set 01a - March.v2.PDF")).toBe("Set 01a - March.v2");
  });

  it("treats dotfiles and bare names as extensionless", () => {
    expect(extensionOf(".DS_Store")).toBe("");
    expect(stemOf("README")).toBe("README");
  });
});

describe("stripInstrumentSuffix", () => {
  it("removes an underscore instrument suffix from a PDF stem", () => {
    expect(stripInstrumentSuffix("Tune line 1_bagpipes", INSTRUMENTS, "pdf")).toBe("Tune line 1");
  });

  it("removes a space-separated suffix", () => {
    expect(stripInstrumentSuffix("Tune line 1 Bass", INSTRUMENTS, "pdf")).toBe("Tune line 1");
  });

  it("leaves WAV stems alone", () => {
    expect(stripInstrumentSuffix("Tune line 1_bass", INSTRUMENTS, "wav")).toBe("Tune line 1_bass");
  });

  it("does not strip an instrument name glued to a word", () => {
    expect(stripInstrumentSuffix("Contrabass", INSTRUMENTS, "pdf")).toBe("Contrabass");
  });

  it("does not reduce a bare instrument name to nothing", () => {
    expect(stripInstrumentSuffix("_bass", INSTRUMENTS, "pdf")).toBe("_bass");
  });
});

describe("hasInstrumentSuffix", () => {
  it("detects suffixed stems", () => {
    expect(hasInstrumentSuffix("Set 01a - Tune_snare", INSTRUMENTS)).toBe(true);
    expect(hasInstrumentSuffix("Set 01a - Tune", INSTRUMENTS)).toBe(false);
  });
});

describe("shortLabel", () => {
  it("cuts a long stem down to the keyword onwards", () => {
    expect(shortLabel("Competition 08 - Prince Charles Welcome to Lochaber line 1")).toBe("line 1");
  });

  it("keeps the original case", () => {
    expect(shortLabel("Set 03 - Reel Phrase 4")).toBe("Phrase 4");
  });

  it("returns a standalone label unchanged", () => {
    expect(shortLabel("part 1")).toBe("part 1");
    expect(shortLabel("phrase 2")).toBe("phrase 2");
  });

  it("is idempotent", () => {
    const once = shortLabel("Set 01b - Strathspey line 3");
    expect(shortLabel(once)).toBe(once);
  });

  it("returns ids without a keyword unchanged", () => {
    expect(shortLabel("phrase_a")).toBe("phrase_a");
  });
});

describe("patterns", () => {
  it("matches tune stems with an optional letter", () => {
    expect(TUNE_STEM_PATTERN.test("Set 01 - March")).toBe(true);
    expect(TUNE_STEM_PATTERN.test("set 12b - Reel")).toBe(true);
    expect(TUNE_STEM_PATTERN.test("Competition 08 - X")).toBe(false);
  });

  it("matches section folders", () => {
    expect(SECTION_FOLDER_PATTERN.test("Section 1 - Comp")).toBe(true);
    expect(SECTION_FOLDER_PATTERN.test("section 10 - Medleys")).toBe(true);
    expect(SECTION_FOLDER_PATTERN.test("Section A - Comp")).toBe(false);
  });
});
