import { describe, expect, it } from "vitest";
import { USAGE, parseCli } from "../cli.js";

describe("parseCli", () => {
  it("serves by default", () => {
    expect(parseCli([])).toEqual({ kind: "serve" });
    expect(parseCli(["serve"])).toEqual({ kind: "serve" });
  });

  it("parses connect with long and short options", () => {
    expect(parseCli(["connect", "a1b2c3d4e5f6", "--key", "/root/.ssh/id_test", "-u", "ubuntu"])).toEqual({
      kind: "connect",
      id: "a1b2c3d4e5f6",
      username: "ubuntu",
      keyPath: "/root/.ssh/id_test"
    });
    expect(parseCli(["connect", "a1b2c3d4e5f6"])).toEqual({
      kind: "connect",
      id: "a1b2c3d4e5f6",
      username: undefined,
      keyPath: undefined
    });
  });

  it("prints usage for malformed invocations", () => {
    expect(parseCli(["connect"])).toEqual({ kind: "usage", message: USAGE });
    expect(parseCli(["connect", "a", "b"])).toEqual({ kind: "usage", message: USAGE });
    expect(parseCli(["launch"])).toEqual({ kind: "usage", message: `Unknown command: launch\n${USAGE}` });

    const unknownFlag = parseCli(["connect", "a1b2c3d4e5f6", "--bogus"]);
    expect(unknownFlag.kind).toBe("usage");
    expect(unknownFlag.kind === "usage" && unknownFlag.message.endsWith(`\n${USAGE}`)).toBe(true);
  });
});
