import { describe, expect, it } from "vitest";
import { isCalendarDate, normalizeRecords } from "./normalize.js";

describe("isCalendarDate", () => {
  it("accepts real days with or without a time part", () => {
    expect(isCalendarDate("2024-02-29")).toBe(true);
    expect(isCalendarDate("2024-03-01T10:00:00Z")).toBe(true);
  });

  it("rejects impossible days and other shapes", () => {
    expect(isCalendarDate("2023-02-29")).toBe(false);
    expect(isCalendarDate("2024-13-01")).toBe(false);
    expect(isCalendarDate("03/01/2024")).toBe(false);
  });
});

describe("normalizeRecords", () => {
  it("coerces numeric strings and fills region and currency defaults", () => {
    const { records, dropped } = normalizeRecords([
      { date: "2024-03-01", service: "Amazon EC2", region: "us-east-1", cost: "12.5" },
      { date: "2024-03-01T08:30:00Z", service: "Amazon S3", cost: 3 },
    ]);

    expect(dropped).toEqual([]);
    expect(records).toEqual([
      { date: "2024-03-01", service: "Amazon EC2", region: "us-east-1", cost: 12.5, currency: "USD" },
      { date: "2024-03-01", service: "Amazon S3", region: "global", cost: 3, currency: "USD" },
    ]);
  });

  it("returns immutable records", () => {
    const { records } = normalizeRecords([{ date: "2024-03-01", service: "S3", cost: 1 }]);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it("keeps the resource id and stamps the default provider", () => {
    const { records } = normalizeRecords(
      [
        { date: "2024-03-01", service: "EC2", cost: 1, resourceId: "i-0abc" },
        { date: "2024-03-01", service: "EC2", cost: 1, provider: "gcp" },
      ],
      { provider: "aws", defaultCurrency: "EUR" },
    );
    expect(records[0]).toEqual({
      date: "2024-03-01",
      service: "EC2",
      region: "global",
      cost: 1,
      currency: "EUR",
      resourceId: "i-0abc",
      provider: "aws",
    });
    expect(records[1]?.provider).toBe("gcp");
  });

  it("drops malformed rows with their index and reason", () => {
    const { records, dropped } = normalizeRecords([
      { date: "2024-02-30", service: "EC2", cost: 1 },
      { date: "2024-03-01", service: "  ", cost: 1 },
      { date: "2024-03-01", service: "EC2", cost: -4 },
      { date: "2024-03-01", service: "EC2", cost: "n/a" },
      null,
      { date: "2024-03-01", service: "EC2", cost: 2 },
    ]);

    expect(records).toHaveLength(1);
    expect(dropped.map((d) => d.index)).toEqual([0, 1, 2, 3, 4]);
    expect(dropped[0]?.reason).toBe("date: expected a YYYY-MM-DD calendar date");
    expect(dropped[1]?.reason).toBe("service: service is required");
    expect(dropped[2]?.reason.startsWith("cost: ")).toBe(true);
    expect(dropped[3]?.reason.startsWith("cost: ")).toBe(true);
    expect(dropped[4]?.reason).toBe("(row): Expected object, received null");
  });
});
