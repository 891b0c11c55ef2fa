import { describe, it, expect } from "vitest";
import { classifyFailure } from "./classify-failure.js";

describe("classifyFailure", () => {
  it.each([
    ["SyntaxError: invalid syntax", "syntax"],
    ["IndentationError: unexpected indent", "syntax"],
    ["ModuleNotFoundError: No module named 'backtesting'", "missing_module"],
    ["FileNotFoundError: [Errno 2] No such file or directory: '/d/BTC.csv'", "data"],
    ["KeyError: 'Close'", "data"],
    ["EnvironmentLocationNotFound: Not a conda environment: /opt/envs/nope", "environment"],
    ["spawn conda ENOENT", "environment"],
    ["timed out after 300s", "timeout"],
    ["ZeroDivisionError: division by zero", "runtime"],
    ["exited with code 3", "unknown"],
    ["", "unknown"],
  ])("%s -> %s", (message, expected) => {
    expect(classifyFailure(message)).toBe(expected);
  });

  it("checks the more specific categories first", () => {
    expect(classifyFailure("Traceback ...\nModuleNotFoundError: No module named 'talib'")).toBe("missing_module");
  });
});
