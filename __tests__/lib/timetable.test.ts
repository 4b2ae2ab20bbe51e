import { currentDaySlot, isDayName, slotRange, withSlotRange } from "@/lib/timetable";

describe("slotRange", () => {
  it("maps slot 0 to 08:00-09:00 and slot 9 to 17:00-18:00", () => {
    expect(slotRange(0)).toEqual({ startTime: "08:00", endTime: "09:00" });
    expect(slotRange(9)).toEqual({ startTime: "17:00", endTime: "18:00" });
  });

  it("adds times to a timetable entry", () => {
    expect(withSlotRange({ roomId: "A-101", day: "Wed", slot: 3, course: "CS101" })).toEqual({
      roomId: "A-101",
      day: "Wed",
      slot: 3,
      course: "CS101",
      startTime: "11:00",
      endTime: "12:00",
    });
  });
});

describe("currentDaySlot", () => {
  it("derives day and slot from UTC time", () => {
    expect(currentDaySlot(new Date("2026-03-02T10:30:00Z"))).toEqual({ day: "Mon", slot: 2 });
    expect(currentDaySlot(new Date("2026-03-08T17:59:59Z"))).toEqual({ day: "Sun", slot: 9 });
  });

  it("has no slot outside teaching hours", () => {
    expect(currentDaySlot(new Date("2026-03-03T07:59:00Z"))).toEqual({ day: "Tue", slot: null });
    expect(currentDaySlot(new Date("2026-03-03T18:00:00Z"))).toEqual({ day: "Tue", slot: null });
  });
});

describe("isDayName", () => {
  it("accepts the seven short day names only", () => {
    expect(isDayName("Fri")).toBe(true);
    expect(isDayName("fri")).toBe(false);
    expect(isDayName("Friday")).toBe(false);
  });
});
