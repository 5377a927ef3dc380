import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultRange, registerCostAnalyzerCli, resolveRange, type CliDependencies } from "./cli.js";
import { ConfigurationError, NotificationError, UpstreamFetchError } from "./errors.js";
import type { WebhookRequest, WebhookSender } from "./notifications/webhook.js";
import type { BillingProvider, FetchRequest } from "./providers/types.js";

const SAMPLE = fileURLToPath(new URL("./__fixtures__/billing-sample.json", import.meta.url));
const NOW = new Date("2024-04-15T10:30:00Z");

function buildProgram(deps: CliDependencies = {}): Command {
  const program = new Command().name("cost-analyzer");
  program.exitOverride();
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  registerCostAnalyzerCli(program, { env: {}, now: () => NOW, ...deps });
  return program;
}

async function run(program: Command, args: string[]): Promise<void> {
  await program.parseAsync(args, { from: "user" });
}

describe("defaultRange", () => {
  it("covers the 30 full days before today", () => {
    expect(defaultRange(NOW)).toEqual({ start: "2024-03-16", end: "2024-04-15" });
    expect(defaultRange(NOW, 1)).toEqual({ start: "2024-04-14", end: "2024-04-15" });
  });
});

describe("resolveRange", () => {
  it("fills missing bounds from the default window", () => {
    expect(resolveRange({ start: "2024-04-01" }, NOW)).toEqual({ start: "2024-04-01", end: "2024-04-15" });
  });

  it("rejects malformed or inverted ranges", () => {
    expect(() => resolveRange({ start: "2024-13-01" }, NOW)).toThrow(ConfigurationError);
    try {
      resolveRange({ start: "2024-04-10", end: "2024-04-10" }, NOW);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual(["--start must be before --end"]);
      }
    }
  });
});

describe("cost-analyzer CLI", () => {
  let output: string[];
  let stderr: string[];
  let dir: string;

  beforeEach(async () => {
    output = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
    dir = await mkdtemp(join(tmpdir(), "cost-analyzer-cli-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeSpikeExport(): Promise<string> {
    const rows = Array.from({ length: 14 }, (_, i) => ({
      date: `2024-01-${String(i + 1).padStart(2, "0")}`,
      service: "AWS Lambda",
      cost: i === 13 ? 500 : 100,
    }));
    const path = join(dir, "spike.json");
    await writeFile(path, JSON.stringify(rows));
    return path;
  }

  describe("analyze", () => {
    it("prints a markdown report for a billing export", async () => {
      await run(buildProgram(), ["analyze", "--input", SAMPLE]);

      expect(output).toHaveLength(1);
      const report = output[0] ?? "";
      expect(report.split("\n").slice(0, 5)).toEqual([
        "# Cloud Cost Optimization Report",
        "",
        "Generated: 2024-04-15T10:30:00.000Z",
        "Total cost: $101.05 USD",
        "Records analyzed: 6",
      ]);
      expect(report).not.toContain("Placeholder data");
    });

    it("limits a billing export to --start and --end", async () => {
      await run(buildProgram(), ["analyze", "--input", SAMPLE, "--start", "2024-03-02", "--end", "2024-03-03"]);
      expect(output[0]).toContain("Records analyzed: 3\n");
      expect(output[0]).toContain("Total cost: $51.25 USD");
    });

    it("fills the missing end of an export range from today", async () => {
      await run(buildProgram(), ["analyze", "--input", SAMPLE, "--start", "2024-03-02"]);
      expect(output[0]).toContain("Records analyzed: 3\n");
    });

    it("rejects an invalid export range", async () => {
      await expect(
        run(buildProgram(), ["analyze", "--input", SAMPLE, "--start", "2024-03-05", "--end", "2024-03-01"]),
      ).rejects.toBeInstanceOf(ConfigurationError);
      expect(output).toEqual([]);
    });

    it("prints JSON on request", async () => {
      await run(buildProgram(), ["analyze", "--input", SAMPLE, "--format", "json"]);
      const parsed: unknown = JSON.parse(output[0] ?? "");
      expect(parsed).toMatchObject({ status: "ok", aggregates: { recordCount: 6 }, authoritative: true });
    });

    it("requires an input or a provider", async () => {
      await expect(run(buildProgram(), ["analyze"])).rejects.toThrow(
        "Either --input <file> or --provider aws is required",
      );
    });

    it("rejects unknown output formats", async () => {
      await expect(run(buildProgram(), ["analyze", "--input", SAMPLE, "--format", "xml"])).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
    });

    it("fetches the default window from the live provider", async () => {
      const requests: FetchRequest[] = [];
      const provider: BillingProvider = {
        id: "aws",
        kind: "aws",
        fetchRecords: async (request) => {
          requests.push(request);
          return {
            providerId: "aws",
            authoritative: true,
            rows: [{ date: "2024-04-01", service: "AWS Lambda", region: "us-east-1", cost: 12 }],
          };
        },
      };

      await run(buildProgram({ createProvider: () => provider }), ["analyze", "--provider", "aws"]);

      expect(requests).toEqual([{ start: "2024-03-16", end: "2024-04-15" }]);
      expect(output[0]).toContain("Total cost: $12.00 USD");
    });

    it("surfaces provider failures unless --fallback is set", async () => {
      const failing: BillingProvider = {
        id: "aws",
        kind: "aws",
        fetchRecords: async () => {
          throw new Error("missing credentials");
        },
      };
      const program = buildProgram({ createProvider: () => failing });

      const args = ["analyze", "--provider", "aws", "--start", "2024-04-01", "--end", "2024-04-02"];

      await expect(run(program, args)).rejects.toBeInstanceOf(UpstreamFetchError);
      await expect(run(buildProgram({ createProvider: () => failing }), args)).rejects.toThrow(
        "[aws] missing credentials",
      );
      expect(output).toEqual([]);
    });

    it("reports placeholder data with --fallback", async () => {
      const failing: BillingProvider = {
        id: "aws",
        kind: "aws",
        fetchRecords: async () => {
          throw new Error("missing credentials");
        },
      };

      await run(buildProgram({ createProvider: () => failing }), [
        "analyze",
        "--provider",
        "aws",
        "--fallback",
        "--start",
        "2024-04-01",
        "--end",
        "2024-04-02",
      ]);

      expect(output[0]).toContain("> Placeholder data: figures are estimates, not live billing data.");
      expect(stderr.join("")).toContain("Provider aws unavailable, using placeholder data");
    });

    it("sends a summary to the webhook from the environment", async () => {
      const requests: WebhookRequest[] = [];
      const sender: WebhookSender = async (request) => {
        requests.push(request);
        return { ok: true, status: 200 };
      };
      const env = { COST_ANALYZER_WEBHOOK_URL: "https://hooks.example.com/hook/test-token" };

      await run(buildProgram({ env, sender }), ["analyze", "--input", SAMPLE, "--notify"]);

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe("https://hooks.example.com/hook/test-token");
      expect(requests[0]?.timeoutMs).toBe(10_000);
      expect(JSON.parse(requests[0]?.body ?? "{}")).toMatchObject({ title: "Cloud Cost Report" });
    });

    it("logs undelivered notifications without failing the run", async () => {
      const sender: WebhookSender = async () => ({ ok: false, status: 500, error: "HTTP 500: down" });
      const env = { COST_ANALYZER_WEBHOOK_URL: "https://hooks.example.com/hook/test-token" };

      await run(buildProgram({ env, sender }), ["analyze", "--input", SAMPLE, "--notify"]);

      expect(output).toHaveLength(1);
      expect(stderr.join("")).toContain("Notification not delivered: [webhook] HTTP 500: down");
    });

    it("refuses --notify without a configured webhook", async () => {
      await expect(run(buildProgram(), ["analyze", "--input", SAMPLE, "--notify"])).rejects.toBeInstanceOf(
        NotificationError,
      );
    });
  });

  describe("anomalies", () => {
    it("lists anomalous days", async () => {
      const path = await writeSpikeExport();
      await run(buildProgram(), ["anomalies", "--input", path]);

      expect(output).toEqual([
        "Baseline: mean $128.57, std dev $106.90 (14 days)",
        "[HIGH] 2024-01-14: $500.00 (3.47 std dev)",
      ]);
    });

    it("applies --threshold", async () => {
      const path = await writeSpikeExport();
      await run(buildProgram(), ["anomalies", "--input", path, "--threshold", "4"]);

      expect(output).toEqual([
        "Baseline: mean $128.57, std dev $106.90 (14 days)",
        "No anomalies beyond 4 standard deviations.",
      ]);
    });

    it("needs at least two days of data", async () => {
      const path = join(dir, "single.json");
      await writeFile(path, JSON.stringify([{ date: "2024-01-01", service: "AWS Lambda", cost: 5 }]));
      await run(buildProgram(), ["anomalies", "--input", path]);

      expect(output).toEqual(["Not enough daily data for anomaly detection (1 days)."]);
    });

    it("requires --input", async () => {
      await expect(run(buildProgram(), ["anomalies"])).rejects.toMatchObject({
        code: "commander.missingMandatoryOptionValue",
      });
    });
  });
});
