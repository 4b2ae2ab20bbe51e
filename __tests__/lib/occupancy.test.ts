import { applyDelta, clampLevel, displayStatus, randomDelta, statusForLevel } from "@/lib/occupancy";

describe("clampLevel", () => {
  it("keeps levels inside 0..100", () => {
    expect(clampLevel(-5)).toBe(0);
    expect(clampLevel(150)).toBe(100);
    expect(clampLevel(42)).toBe(42);
  });

  it("rounds fractional levels", () => {
    expect(clampLevel(41.6)).toBe(42);
  });

  it("treats non-finite values as empty", () => {
    expect(clampLevel(Number.NaN)).toBe(0);
    expect(clampLevel(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("statusForLevel", () => {
  it("is free up to and including the threshold", () => {
    expect(statusForLevel(0)).toBe("free");
    expect(statusForLevel(30)).toBe("free");
    expect(statusForLevel(31)).toBe("occupied");
  });

  it("honours a custom threshold", () => {
    expect(statusForLevel(31, 50)).toBe("free");
    expect(statusForLevel(51, 50)).toBe("occupied");
  });
});

describe("displayStatus", () => {
  it("reports booked rooms as Full whatever the level", () => {
    expect(displayStatus({ occupancyLevel: 0, booked: true })).toBe("Full");
  });

  it("uses the partial and full thresholds", () => {
    expect(displayStatus({ occupancyLevel: 30 })).toBe("Free");
    expect(displayStatus({ occupancyLevel: 31 })).toBe("Partial");
    expect(displayStatus({ occupancyLevel: 94 })).toBe("Partial");
    expect(displayStatus({ occupancyLevel: 95 })).toBe("Full");
  });

  it("accepts custom thresholds", () => {
    const t = { partial: 10, full: 50 };
    expect(displayStatus({ occupancyLevel: 11 }, t)).toBe("Partial");
    expect(displayStatus({ occupancyLevel: 50 }, t)).toBe("Full");
  });
});

describe("randomDelta", () => {
  it("spans [-maxDelta, maxDelta]", () => {
    expect(randomDelta(15, () => 0)).toBe(-15);
    expect(randomDelta(15, () => 0.999)).toBe(15);
    expect(randomDelta(15, () => 0.5)).toBe(0);
  });

  it("is zero when maxDelta is not positive", () => {
    expect(randomDelta(0, () => 0.9)).toBe(0);
  });
});

describe("applyDelta", () => {
  it("clamps the result", () => {
    expect(applyDelta(95, 15)).toBe(100);
    expect(applyDelta(5, -15)).toBe(0);
    expect(applyDelta(40, -10)).toBe(30);
  });
});
