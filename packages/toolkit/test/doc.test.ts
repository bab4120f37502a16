import { parseDoc } from "../src";

describe("parseDoc", () => {
  it("should take the first sentence of the first line as summary", () => {
    const doc = parseDoc(
      "Checks the weather. Uses wttr.in\n@param location - City name\n@param units metric or imperial"
    );

    expect(doc.summary).toBe("Checks the weather");
    expect([...doc.params.entries()]).toEqual([
      ["location", "City name"],
      ["units", "metric or imperial"],
    ]);
  });

  it("should accept text copied from a JSDoc block", () => {
    const doc = parseDoc("\n  * Adds numbers.\n  * @param a - first\n  * @param b");

    expect(doc.summary).toBe("Adds numbers.");
    expect(doc.params.get("a")).toBe("first");
    expect(doc.params.has("b")).toBe(false);
  });

  it("should return an empty summary without documentation", () => {
    const doc = parseDoc(undefined);

    expect(doc.summary).toBe("");
    expect(doc.params.size).toBe(0);
  });
});
