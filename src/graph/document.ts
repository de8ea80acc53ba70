import yaml from "js-yaml";
import { z } from "zod";
import type { EdgeId, VertexId } from "../types.js";
import { formatIssues } from "../layout/config.js";
import { MultiGraph } from "./multigraph.js";

const IdSchema = z.union([z.string().min(1), z.number().finite()]).transform((value) => String(value));

const VertexSchema = z.union([
  IdSchema,
  z
    .object({
      id: IdSchema,
      label: z.union([z.string(), z.number()]).optional(),
      selected: z.boolean().optional(),
    })
    .strict(),
]);

const EdgeSchema = z
  .object({
    from: IdSchema,
    to: IdSchema,
    label: z.union([z.string(), z.number()]).optional(),
    selected: z.boolean().optional(),
  })
  .strict();

const GraphDocumentSchema = z
  .object({
    vertices: z.array(VertexSchema).default([]),
    edges: z.array(EdgeSchema).default([]),
  })
  .strict();

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

export interface LoadedGraph {
  graph: MultiGraph<string, string>;
  ids: Map<string, VertexId>;
  selectedVertices: Set<VertexId>;
  selectedEdges: Set<EdgeId>;
}

export function parseGraphDocument(raw: string): GraphDocument {
  const loaded = yaml.load(raw);
  if (loaded === undefined || loaded === null) {
    return { vertices: [], edges: [] };
  }
  const parsed = GraphDocumentSchema.safeParse(loaded);
  if (!parsed.success) {
    throw new Error(`Invalid graph document: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function buildGraph(doc: GraphDocument): LoadedGraph {
  const graph = new MultiGraph<string, string>();
  const ids = new Map<string, VertexId>();
  const selectedVertices = new Set<VertexId>();
  const selectedEdges = new Set<EdgeId>();

  doc.vertices.forEach((entry, index) => {
    const id = typeof entry === "string" ? entry : entry.id;
    if (ids.has(id)) {
      throw new Error(`Duplicate vertex id "${id}" at vertices[${index}]`);
    }
    const label = typeof entry === "string" || entry.label === undefined ? id : String(entry.label);
    const vertex = graph.addVertex(label);
    ids.set(id, vertex);
    if (typeof entry !== "string" && entry.selected) {
      selectedVertices.add(vertex);
    }
  });

  doc.edges.forEach((entry, index) => {
    const from = ids.get(entry.from);
    const to = ids.get(entry.to);
    if (from === undefined) {
      throw new Error(`edges[${index}] references unknown vertex "${entry.from}"`);
    }
    if (to === undefined) {
      throw new Error(`edges[${index}] references unknown vertex "${entry.to}"`);
    }
    if (from === to) {
      throw new Error(`edges[${index}] is a self-loop on "${entry.from}", which is not supported`);
    }
    const edge = graph.addEdge(from, to, entry.label === undefined ? "" : String(entry.label));
    if (entry.selected) {
      selectedEdges.add(edge);
    }
  });

  return { graph, ids, selectedVertices, selectedEdges };
}

export function loadGraphDocument(raw: string): LoadedGraph {
  return buildGraph(parseGraphDocument(raw));
}
