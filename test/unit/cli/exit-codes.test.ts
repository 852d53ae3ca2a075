import { describe, it, expect } from "vitest";

import { ExitCode, describeFailure, exitCodeFor } from "../../../src/cli/exit-codes.js";
import {
  BaserowAuthError,
  ConfigurationError,
  InputValidationError,
  UsageError,
} from "../../../src/core/errors.js";

describe("exitCodeFor", () => {
  it("maps usage and input problems to 2", () => {
    expect(exitCodeFor(new UsageError("bad flag"))).toBe(ExitCode.USAGE);
    expect(exitCodeFor(new InputValidationError("bad isbn"))).toBe(ExitCode.USAGE);
  });

  it("maps everything else to 1", () => {
    expect(exitCodeFor(new ConfigurationError("missing token"))).toBe(ExitCode.FAILURE);
    expect(exitCodeFor(new BaserowAuthError(401))).toBe(ExitCode.FAILURE);
    expect(exitCodeFor("a string")).toBe(ExitCode.FAILURE);
  });
});

describe("describeFailure", () => {
  it("prefixes the message", () => {
    expect(describeFailure(new BaserowAuthError(403))).toBe(
      "Error: Baserow authentication failed; check your API token",
    );
    expect(describeFailure("plain")).toBe("Error: plain");
  });
});
