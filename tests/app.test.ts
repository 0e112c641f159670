import { describe, it, expect } from "vitest";
import app from "../src/application/app";

describe("App", () => {
  it("exports the Express application", () => {
    expect(app).toBeDefined();
    expect(typeof app).toBe("function");
  });
});
