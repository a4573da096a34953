import { describe, expect, it } from "vitest";
import {
  cleanCommandName,
  matchesOption,
  optionToken,
} from "../../../src/remote/naming.ts";

describe("cleanCommandName", () => {
  it("upper-cases and joins words with underscores", () => {
    expect(cleanCommandName("Desk Lamp")).toBe("DESK_LAMP");
  });

  it("collapses runs of punctuation and trims the ends", () => {
    expect(cleanCommandName("  Kid's -- Room!! ")).toBe("KID_S_ROOM");
  });

  it("keeps letters and digits of any script", () => {
    expect(cleanCommandName("Küche 2")).toBe("KÜCHE_2");
  });

  it("is idempotent", () => {
    const once = cleanCommandName("Living room (TV)");
    expect(cleanCommandName(once)).toBe(once);
  });

  it("can clean to an empty prefix", () => {
    expect(cleanCommandName("***")).toBe("");
  });
});

describe("optionToken", () => {
  it("replaces spaces and keeps apostrophes by default", () => {
    expect(optionToken("Kid's Room")).toBe("KID'S_ROOM");
  });

  it("strips apostrophes when asked", () => {
    expect(optionToken("Kid's Room", true)).toBe("KIDS_ROOM");
  });
});

describe("matchesOption", () => {
  it("compares case-insensitively", () => {
    expect(matchesOption("energic", "Energic")).toBe(true);
    expect(matchesOption("KIDS_ROOM", "Kid's Room", true)).toBe(true);
    expect(matchesOption("KIDS_ROOM", "Kid's Room")).toBe(false);
  });
});
