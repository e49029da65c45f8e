import { describe, it, expect } from "vitest";
import { askChoice, askNumber, collectBeamInput, FormAborted } from "./form.js";
import type { FormIO } from "./form.js";

function scripted(answers: string[]): FormIO & { said: string[]; questions: string[]; commands: string[] } {
  const queue = [...answers];
  const said: string[] = [];
  const questions: string[] = [];
  const commands: string[] = [];
  return {
    said,
    questions,
    commands,
    ask: async (question) => {
      questions.push(question);
      return queue.shift() ?? "";
    },
    say: (message) => said.push(message),
    command: (name) => commands.push(name),
  };
}

describe("collectBeamInput", () => {
  it("fills every field from the defaults", async () => {
    const io = scripted([]);
    expect(await collectBeamInput(io)).toEqual({
      span_m: 10,
      E_gpa: 200,
      I_cm4: 5000,
      point_loads: [
        { magnitude_kn: 10, position_m: 2 },
        { magnitude_kn: 10, position_m: 3 },
      ],
      udl: null,
      moments: [{ magnitude_knm: 5, position_m: 4 }],
    });
    expect(io.questions[0]).toBe("Beam Length (m) [10]: ");
  });

  it("asks for the UDL when requested", async () => {
    // span, E, I, 0 loads, UDL yes, w, a, b, 0 moments
    const io = scripted(["8", "", "", "0", "y", "3", "1", "7", "0"]);
    expect(await collectBeamInput(io)).toEqual({
      span_m: 8,
      E_gpa: 200,
      I_cm4: 5000,
      point_loads: [],
      udl: { intensity_kn_per_m: 3, start_m: 1, end_m: 7 },
      moments: [],
    });
  });

  it("stops on /quit", async () => {
    await expect(collectBeamInput(scripted(["12", "/quit"]))).rejects.toBeInstanceOf(FormAborted);
  });
});

describe("askNumber", () => {
  it("re-asks until the value is a number inside the range", async () => {
    const io = scripted(["abc", "150", "12"]);
    expect(await askNumber(io, "Beam Length (m)", 10, { min: 1, max: 100 })).toBe(12);
    expect(io.said).toEqual([
      'Beam Length (m): "abc" is not a number.',
      "Beam Length (m) must be between 1 and 100.",
    ]);
  });

  it("hands other slash commands to the caller", async () => {
    const io = scripted(["/status", "4"]);
    expect(await askNumber(io, "Load 1 Position (m)", 2)).toBe(4);
    expect(io.commands).toEqual(["status"]);
  });
});

describe("askChoice", () => {
  it("accepts a listed choice case-insensitively", async () => {
    const io = scripted(["PNG", "PDF"]);
    expect(await askChoice(io, "Export", ["pdf", "svg", "none"] as const, "none")).toBe("pdf");
    expect(io.said).toEqual(["Choose one of: pdf, svg, none."]);
  });
});
