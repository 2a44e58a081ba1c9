import { describe, it, expect } from "vitest";
import {
  NetworkError,
  StructuralError,
  NotFoundError,
  invalidInput,
  advisory,
} from "../src/errors.js";

describe("errors", () => {
  it("StructuralError is a NetworkError with code STRUCTURAL", () => {
    const error = new StructuralError("cycle at R2");
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("STRUCTURAL");
    expect(error.name).toBe("StructuralError");
    expect(error.message).toBe("cycle at R2");
  });

  it("NotFoundError keeps the missing id", () => {
    const error = new NotFoundError("GAGE_7", "Downstream node");
    expect(error.code).toBe("NOT_FOUND");
    expect(error.id).toBe("GAGE_7");
    expect(error.message).toBe("Downstream node not found: GAGE_7");
  });

  it("invalidInput builds an INVALID NetworkError", () => {
    const error = invalidInput("id must not be empty");
    expect(error.code).toBe("INVALID");
    expect(error.name).toBe("NetworkError");
  });

  it("advisory is plain data", () => {
    expect(advisory("R1", "moved inside limits")).toEqual({
      kind: "advisory",
      nodeId: "R1",
      message: "moved inside limits",
    });
  });
});
