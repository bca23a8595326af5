import { describe, expect, it } from "vitest";
import { parseRoster } from "../src/roster";

describe("parseRoster", () => {
  it("normalises crew and appliance entries", () => {
    const roster = parseRoster([
      { id: " C1 ", name: "Jo Bloggs", role: "wc", skills: "ba, ttr" },
      { id: "P22P6", kind: "appliance", name: "P22P6", role: "WC", skills: ["BA"] },
      { id: "C2", name: "Sam Lee", role: null },
    ]);

    expect(roster).toEqual([
      { id: "C1", kind: "crew", name: "Jo Bloggs", role: "WC", skills: ["BA", "TTR"] },
      { id: "P22P6", kind: "appliance", name: "P22P6", skills: [] },
      { id: "C2", kind: "crew", name: "Sam Lee", skills: [] },
    ]);
  });

  it("accepts a wrapped list", () => {
    expect(parseRoster({ resources: [{ id: "C1", name: "Jo Bloggs", skills: ["lgv"] }] })).toEqual([
      { id: "C1", kind: "crew", name: "Jo Bloggs", skills: ["LGV"] },
    ]);
  });

  it("keeps crew contract hours as text", () => {
    const roster = parseRoster([
      { id: "C1", name: "Jo Bloggs", contractHours: 56 },
      { id: "C2", name: "Sam Lee", contractHours: " 42h " },
      { id: "P22P6", kind: "appliance", name: "P22P6", contractHours: "56" },
    ]);

    expect(roster.map((entry) => entry.contractHours)).toEqual(["56", "42h", undefined]);
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      parseRoster([
        { id: "C1", name: "Jo Bloggs" },
        { id: "C1", name: "Someone Else" },
      ])
    ).toThrow('Duplicate roster id "C1"');
  });

  it.each([
    ["a missing name", [{ id: "C1" }]],
    ["an unknown kind", [{ id: "C1", name: "Jo", kind: "boat" }]],
    ["a non-list payload", "C1,C2"],
  ])("rejects %s", (_label, payload) => {
    expect(() => parseRoster(payload)).toThrow();
  });
});
