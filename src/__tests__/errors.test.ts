import { describe, it, expect } from "vitest";
import { ErrorCodes, ResponseError } from "vscode-languageserver-protocol";
import { CompilerError, DocumentNotFoundError, ResponseParseError, toResponseError } from "../errors.js";

describe("toResponseError", () => {
  it("reports untracked documents as invalid params", () => {
    const err = toResponseError(new DocumentNotFoundError("file:///a.nu"));
    expect(err.code).toBe(ErrorCodes.InvalidParams);
    expect(err.message).toBe("file:///a.nu not found in document cache");
  });

  it("reports compiler failures as internal errors with the cause", () => {
    const err = toResponseError(new CompilerError("spawn", "failed to run nu", new Error("ENOENT")));
    expect(err.code).toBe(ErrorCodes.InternalError);
    expect(err.data).toBe("ENOENT");
  });

  it("reports undecodable output as a parse error", () => {
    expect(toResponseError(new CompilerError("decode", "bad utf-8")).code).toBe(ErrorCodes.ParseError);
    const err = toResponseError(new ResponseParseError("nu --ide-hover 3 /tmp/x.nu"));
    expect(err.code).toBe(ErrorCodes.ParseError);
    expect(err.message).toBe("cannot parse response from nu --ide-hover 3 /tmp/x.nu");
  });

  it("passes response errors through", () => {
    const err = toResponseError(new ResponseError(ErrorCodes.MethodNotFound, "nope", "detail"));
    expect(err.code).toBe(ErrorCodes.MethodNotFound);
    expect(err.data).toBe("detail");
  });

  it("treats anything else as internal", () => {
    const err = toResponseError("boom");
    expect(err.code).toBe(ErrorCodes.InternalError);
    expect(err.message).toBe("boom");
  });
});
