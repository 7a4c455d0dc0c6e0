import { jsonParser } from "@/utils/jsonParser";

describe("jsonParser", () => {
  it("parses plain JSON", () => {
    expect(jsonParser('{"score": 7}')).toEqual({ score: 7 });
  });

  it("strips markdown fences", () => {
    expect(jsonParser('```json\n{"score": 7}\n```')).toEqual({ score: 7 });
    expect(jsonParser('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it("extracts JSON surrounded by prose", () => {
    expect(
      jsonParser('Sure! Here it is: {"score": 4, "reply_points": ["a"]} Cheers.')
    ).toEqual({ score: 4, reply_points: ["a"] });
  });

  it("throws on empty input", () => {
    expect(() => jsonParser("  ")).toThrow("Input string is empty");
  });

  it("throws when there is no JSON", () => {
    expect(() => jsonParser("no structured answer")).toThrow(SyntaxError);
  });
});
