import { describe, expect, it } from "vitest";
import { InvalidCurveError } from "../../errors/shaping.js";
import { JsonTransport } from "../transports/json.js";

describe("JsonTransport", () => {
  const timestamp = new Date("2025-12-26T10:00:00.000Z");

  it("emits one JSON object per entry", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({ level: "info", message: "applied", timestamp, context: { component: "orchestrator" } });

    expect(lines).toEqual([
      '{"time":"2025-12-26T10:00:00.000Z","level":"info","context":{"component":"orchestrator"},"message":"applied"}',
    ]);
  });

  it("serializes errors in data", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({
      level: "error",
      message: "curve",
      timestamp,
      data: new InvalidCurveError("sustained rate must be positive", { tierId: 10 }),
    });

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      time: "2025-12-26T10:00:00.000Z",
      level: "error",
      message: "curve",
      data: {
        name: "InvalidCurveError",
        message: "sustained rate must be positive",
        code: 1102,
        context: { tierId: 10 },
      },
    });
  });
});
