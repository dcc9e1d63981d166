import { generateRid, isRid, parseRid, RID_SUFFIX_LENGTH } from "../utils/rid";

describe("generateRid", () => {
  it("produces <tag>..<16 alphanumerics>", () => {
    for (const tag of ["user", "steps", "heartrate", "goal", "conversation"]) {
      expect(generateRid(tag)).toMatch(new RegExp(`^${tag}\\.\\.[A-Za-z0-9]{${RID_SUFFIX_LENGTH}}$`));
    }
  });

  it("does not repeat a suffix across 100,000 calls", () => {
    const suffixes = new Set<string>();
    for (let i = 0; i < 100_000; i++) {
      suffixes.add(generateRid("steps").slice("steps..".length));
    }
    expect(suffixes.size).toBe(100_000);
  });

  it("draws from the whole alphabet", () => {
    const seen = new Set<string>();
    for (let i = 0; i < 2_000; i++) {
      for (const char of generateRid("user").slice("user..".length)) {
        seen.add(char);
      }
    }
    expect(seen.size).toBe(62);
  });

  it.each(["", "User", "1steps", "heart-rate", "a".repeat(33)])("rejects the tag %p", (tag) => {
    expect(() => generateRid(tag)).toThrow("Invalid RID tag");
  });
});

describe("parseRid", () => {
  it("splits a generated RID", () => {
    const rid = generateRid("workout");
    const parsed = parseRid(rid);
    expect(parsed?.tag).toBe("workout");
    expect(parsed?.suffix).toBe(rid.slice("workout..".length));
  });

  it.each([
    "workout",
    "workout..",
    "workout..short",
    "Workout..ABCDEFGHIJKLMNOP",
    "workout..ABCDEFGHIJKLMNO!",
    "workout.ABCDEFGHIJKLMNOP",
  ])("returns null for %p", (value) => {
    expect(parseRid(value)).toBeNull();
  });
});

describe("isRid", () => {
  it("checks the tag when one is given", () => {
    const rid = generateRid("sleep");
    expect(isRid(rid)).toBe(true);
    expect(isRid(rid, "sleep")).toBe(true);
    expect(isRid(rid, "steps")).toBe(false);
    expect(isRid("not-a-rid")).toBe(false);
  });
});
