/**
 * @fileoverview Reading networks and scenarios from outside the engine.
 *
 * Two network formats:
 * - JSON: a NetworkDescription (`nodes` may be omitted; they are then
 *   inferred from the edges)
 * - CSV/TSV edge list with a header row naming `u`, `v` and
 *   `capacity_mld` (or `capacity`)
 *
 * Shapes are checked with zod here; graph rules (self-loops, duplicate
 * pipes, negative capacities) stay with FlowNetwork.
 *
 * @module io/NetworkLoader
 */

import { readFileSync } from "fs";
import { extname } from "path";
import { z } from "zod";
import { InvalidNetworkError, InvalidScenarioError } from "../errors/FlowErrors";
import { FlowNetwork } from "../network/FlowNetwork";
import type { EdgeDescription, NetworkOptions } from "../network/NetworkTypes";
import type { Scenario } from "../scenario/Scenario";

export const DEFAULT_SOURCE = "S";
export const DEFAULT_SINK = "T";

export const NodeDescriptionSchema = z.object({
  id: z.string().min(1),
  role: z.enum(["SOURCE", "SINK", "INTERMEDIATE"]).optional(),
});

export const EdgeDescriptionSchema = z.object({
  id: z.string().min(1).optional(),
  from: z.string().min(1),
  to: z.string().min(1),
  capacity: z.number(),
});

export const NetworkFileSchema = z.object({
  nodes: z.array(NodeDescriptionSchema).optional(),
  edges: z.array(EdgeDescriptionSchema),
  source: z.string().min(1).default(DEFAULT_SOURCE),
  sink: z.string().min(1).default(DEFAULT_SINK),
});

export const ScenarioSchema = z
  .object({
    defaultLeakage: z.number().optional(),
    leakage: z.record(z.number()).optional(),
    failedEdges: z.array(z.string()).optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Builds a network from parsed JSON.
 *
 * @throws InvalidNetworkError on shape or graph errors
 */
export function parseNetworkJson(json: unknown, options: Partial<NetworkOptions> = {}): FlowNetwork {
  const parsed = NetworkFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidNetworkError(`Invalid network description: ${formatIssues(parsed.error)}`);
  }

  const { nodes, edges, source, sink } = parsed.data;
  if (nodes === undefined) {
    return FlowNetwork.fromEdges(edges, source, sink, options);
  }
  return new FlowNetwork({ nodes, edges, source, sink }, options);
}

/**
 * @throws InvalidScenarioError when the JSON is not a scenario
 */
export function parseScenarioJson(json: unknown): Scenario {
  const parsed = ScenarioSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidScenarioError(`Invalid scenario: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function findColumn(header: string[], names: string[]): number {
  return header.findIndex((h) => names.includes(h));
}

/**
 * Parses an edge list. Comma and tab separators are both accepted; the
 * separator is taken from the header row.
 *
 * @throws InvalidNetworkError on missing columns or unparsable rows
 */
export function parseEdgeCsv(text: string): EdgeDescription[] {
  const lines = text
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), number: index + 1 }))
    .filter(({ line }) => line.length > 0 && !line.startsWith("#"));

  if (lines.length === 0) {
    throw new InvalidNetworkError("Edge list is empty");
  }

  const separator = lines[0].line.includes("\t") ? "\t" : ",";
  const header = lines[0].line.split(separator).map((h) => h.trim().toLowerCase());
  const fromCol = findColumn(header, ["u", "from"]);
  const toCol = findColumn(header, ["v", "to"]);
  const capCol = findColumn(header, ["capacity_mld", "capacity"]);

  if (fromCol < 0 || toCol < 0 || capCol < 0) {
    throw new InvalidNetworkError(`Edge list header must name u, v and capacity_mld; got "${lines[0].line}"`);
  }

  return lines.slice(1).map(({ line, number }) => {
    const cells = line.split(separator).map((c) => c.trim());
    const from = cells[fromCol] ?? "";
    const to = cells[toCol] ?? "";
    const capacity = Number(cells[capCol]);

    if (from === "" || to === "" || cells[capCol] === undefined || cells[capCol] === "" || Number.isNaN(capacity)) {
      throw new InvalidNetworkError(`Line ${number}: cannot read edge from "${line}"`, { line: number });
    }

    return { from, to, capacity };
  });
}

/**
 * Loads a network from a .csv/.tsv edge list or a .json description.
 */
export function loadNetworkFile(
  filePath: string,
  endpoints: { source?: string; sink?: string } = {},
  options: Partial<NetworkOptions> = {}
): FlowNetwork {
  const text = readFileSync(filePath, "utf-8");
  const ext = extname(filePath).toLowerCase();

  if (ext === ".json") {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new InvalidNetworkError(`Failed to parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return parseNetworkJson(json, options);
  }

  return FlowNetwork.fromEdges(
    parseEdgeCsv(text),
    endpoints.source ?? DEFAULT_SOURCE,
    endpoints.sink ?? DEFAULT_SINK,
    options
  );
}
