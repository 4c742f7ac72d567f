import { describe, expect, it } from "vitest";
import { readShareId } from "./share";

describe("readShareId", () => {
  it("reads the share parameter", () => {
    expect(readShareId("?share=abc123")).toBe("abc123");
    expect(readShareId("?share=%20")).toBeNull();
    expect(readShareId("")).toBeNull();
  });

  it("reads an id back from a server-built link", () => {
    expect(readShareId(new URL("https://profile.example.com/app/?share=abc%2F1").search)).toBe("abc/1");
  });
});
