/**
 * AWS Cost Explorer provider tests
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

const { sendMock } = vi.hoisted(() => ({ sendMock: vi.fn() }));

vi.mock("@aws-sdk/client-cost-explorer", () => ({
  CostExplorerClient: vi.fn(function () {
    return { send: sendMock };
  }),
  GetCostAndUsageCommand: vi.fn(function (input: unknown) {
    return { input };
  }),
}));

import { UpstreamFetchError } from "../errors.js";
import { normalizeRecords } from "../ingest/normalize.js";
import { createAwsCostExplorerProvider, parseCostAndUsage } from "./aws.js";

function page(start: string, groups: Array<[string, string, string]>, nextPageToken?: string) {
  return {
    ResultsByTime: [
      {
        TimePeriod: { Start: start, End: start },
        Groups: groups.map(([service, region, amount]) => ({
          Keys: [service, region],
          Metrics: { UnblendedCost: { Amount: amount, Unit: "USD" } },
        })),
        Estimated: false,
      },
    ],
    NextPageToken: nextPageToken,
  };
}

describe("parseCostAndUsage", () => {
  it("flattens grouped results into billing rows", () => {
    const rows = parseCostAndUsage(
      page("2024-01-01", [
        ["Amazon Elastic Compute Cloud - Compute", "us-east-1", "80.00"],
        ["Amazon Simple Storage Service", "eu-west-1", "20.5"],
      ]),
    );
    expect(rows).toEqual([
      {
        date: "2024-01-01",
        service: "Amazon Elastic Compute Cloud - Compute",
        region: "us-east-1",
        cost: "80.00",
        currency: "USD",
        provider: "aws",
      },
      {
        date: "2024-01-01",
        service: "Amazon Simple Storage Service",
        region: "eu-west-1",
        cost: "20.5",
        currency: "USD",
        provider: "aws",
      },
    ]);
  });

  it("produces rows the normalizer accepts", () => {
    const { records, dropped } = normalizeRecords(parseCostAndUsage(page("2024-01-01", [["AWS Lambda", "NoRegion", "1.25"]])));
    expect(dropped).toEqual([]);
    expect(records[0]).toMatchObject({ service: "AWS Lambda", region: "NoRegion", cost: 1.25, provider: "aws" });
  });

  it("handles an empty response", () => {
    expect(parseCostAndUsage({})).toEqual([]);
  });
});

describe("AwsCostExplorerProvider", () => {
  beforeEach(() => {
    sendMock.mockReset();
  });

  it("requests daily unblended cost grouped by service and region", async () => {
    sendMock.mockResolvedValueOnce(page("2024-01-01", [["AWS Lambda", "us-east-1", "3"]]));
    const provider = createAwsCostExplorerProvider();

    const batch = await provider.fetchRecords({ start: "2024-01-01", end: "2024-01-02" });

    expect(batch).toEqual({
      providerId: "aws",
      authoritative: true,
      rows: [{ date: "2024-01-01", service: "AWS Lambda", region: "us-east-1", cost: "3", currency: "USD", provider: "aws" }],
    });
    expect(sendMock.mock.calls[0]?.[0]).toEqual({
      input: {
        TimePeriod: { Start: "2024-01-01", End: "2024-01-02" },
        Granularity: "DAILY",
        Metrics: ["UnblendedCost"],
        GroupBy: [
          { Type: "DIMENSION", Key: "SERVICE" },
          { Type: "DIMENSION", Key: "REGION" },
        ],
        NextPageToken: undefined,
      },
    });
  });

  it("follows NextPageToken across pages", async () => {
    sendMock
      .mockResolvedValueOnce(page("2024-01-01", [["EC2", "us-east-1", "1"]], "page-2"))
      .mockResolvedValueOnce(page("2024-01-02", [["EC2", "us-east-1", "2"]]));
    const provider = createAwsCostExplorerProvider();

    const batch = await provider.fetchRecords({ start: "2024-01-01", end: "2024-01-03" });

    expect(batch.rows).toHaveLength(2);
    expect(sendMock).toHaveBeenCalledTimes(2);
    expect(sendMock.mock.calls[1]?.[0]).toMatchObject({ input: { NextPageToken: "page-2" } });
  });

  it("stops at the page limit", async () => {
    sendMock.mockResolvedValue(page("2024-01-01", [["EC2", "us-east-1", "1"]], "more"));
    const provider = createAwsCostExplorerProvider({ maxPages: 2 });

    const batch = await provider.fetchRecords({ start: "2024-01-01", end: "2024-01-02" });
    expect(batch.rows).toHaveLength(2);
    expect(sendMock).toHaveBeenCalledTimes(2);
  });

  it("wraps failures in UpstreamFetchError", async () => {
    const denied = new Error("not authorized");
    denied.name = "AccessDeniedException";
    sendMock.mockRejectedValue(denied);
    const provider = createAwsCostExplorerProvider({ id: "aws-prod" });

    const error = await provider.fetchRecords({ start: "2024-01-01", end: "2024-01-02" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({
      providerId: "aws-prod",
      code: "UPSTREAM_FETCH_FAILED",
      message: "[aws-prod] GetCostAndUsage failed: not authorized",
      cause: denied,
    });
    expect(sendMock).toHaveBeenCalledTimes(1);
  });

  it("retries throttled calls", async () => {
    const throttled = new Error("Rate exceeded");
    throttled.name = "ThrottlingException";
    sendMock.mockRejectedValueOnce(throttled).mockResolvedValueOnce(page("2024-01-01", []));
    const provider = createAwsCostExplorerProvider({ retry: { minDelayMs: 0, maxDelayMs: 0 } });

    const batch = await provider.fetchRecords({ start: "2024-01-01", end: "2024-01-02" });
    expect(batch.rows).toEqual([]);
    expect(sendMock).toHaveBeenCalledTimes(2);
  });
});
