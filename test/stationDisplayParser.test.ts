import { describe, expect, it } from "vitest";
import { ParseFailure } from "../src/errors";
import { parseStationDisplay, stationFeedStates } from "../src/stationDisplayParser";
import { appliance, crew } from "./helpers/grid";

const DISPLAY = `
<html><body>
  <span id="lblTime">08:30</span>
  <span id="lblDate">05/08/2025</span>
  <span id="lblStation">Northfield</span>
  <table id="gvCrewing">
    <tr><th>Skill</th><th>Available</th></tr>
    <tr><td>BA</td><td>3 (+1)</td></tr>
    <tr><td>LGV</td><td>1 (-1)</td></tr>
    <tr><td>TTR</td><td>none</td></tr>
  </table>
  <table id="gvOnDuty">
    <tr><th>Role</th><th>Name</th><th>Skills</th></tr>
    <tr><td>WC</td><td>Jo Bloggs</td><td>(BA, TTR)</td></tr>
    <tr><td>FFT</td><td>Sam Lee</td><td>LGV</td></tr>
  </table>
  <table id="gvAppliances">
    <tr><td>P22P6</td><td>Off the run</td></tr>
    <tr><td>P22P7</td><td>On the run</td></tr>
  </table>
</body></html>`;

describe("parseStationDisplay", () => {
  it("reads the header, crewing summary, on-duty list and appliance status", () => {
    expect(parseStationDisplay(DISPLAY)).toEqual({
      time: "08:30",
      date: "05/08/2025",
      station: "Northfield",
      crewingSummary: {
        BA: { available: 3, difference: 1 },
        LGV: { available: 1, difference: -1 },
      },
      onDuty: [
        { role: "WC", name: "Jo Bloggs", skills: ["BA", "TTR"] },
        { role: "FFT", name: "Sam Lee", skills: ["LGV"] },
      ],
      appliances: { P22P6: false, P22P7: true },
    });
  });

  it("accepts a page without the optional tables", () => {
    const display = parseStationDisplay(
      `<span id="lblTime">08:30</span><span id="lblDate">05/08/2025</span><span id="lblStation">Northfield</span>`
    );

    expect(display.crewingSummary).toEqual({});
    expect(display.onDuty).toEqual([]);
    expect(display.appliances).toEqual({});
  });

  it("throws ParseFailure without the station header", () => {
    expect(() =>
      parseStationDisplay(`<span id="lblTime">08:30</span><span id="lblDate">05/08/2025</span>`)
    ).toThrow(ParseFailure);
  });
});

describe("stationFeedStates", () => {
  it("marks on-duty crew available and the rest unavailable", () => {
    const roster = [
      { ...crew("C1", "WC", ["BA", "TTR"]), name: "Jo Bloggs" },
      { ...crew("C2", "FFT", []), name: "Max Roe" },
      { ...crew("C3", "FFT", ["LGV"]), name: "sam lee" },
      appliance("P22P6"),
      appliance("P22P8"),
    ];

    const states = stationFeedStates(parseStationDisplay(DISPLAY), roster);

    expect(Object.fromEntries(states)).toEqual({ C1: true, C2: false, C3: true, P22P6: false });
  });
});
