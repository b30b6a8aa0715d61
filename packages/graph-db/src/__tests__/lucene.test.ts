import { describe, it, expect } from "vitest";
import { luceneSanitize } from "../search/lucene.js";

describe("luceneSanitize", () => {
  it("leaves plain words alone", () => {
    expect(luceneSanitize("harbor master")).toBe("harbor master");
  });

  it("escapes special characters", () => {
    expect(luceneSanitize('who? "Port" (Alder)')).toBe('who\\? \\"Port\\" \\(Alder\\)');
    expect(luceneSanitize("a+b-c:d/e")).toBe("a\\+b\\-c\\:d\\/e");
  });

  it("lowercases boolean operators", () => {
    expect(luceneSanitize("Mira AND Tomas OR NOT Port")).toBe("Mira and Tomas or not Port");
  });
});
