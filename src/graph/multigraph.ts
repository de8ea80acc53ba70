import type { EdgeId, GraphProvider, VertexId } from "../types.js";

interface VertexSlot<V> {
  element: V;
  incident: Set<EdgeId>;
}

interface EdgeSlot<E> {
  element: E;
  endpoints: readonly [VertexId, VertexId];
}

// Handles are issued in insertion order and never reused.
export class MultiGraph<V, E> implements GraphProvider<V, E> {
  private readonly vertexSlots = new Map<VertexId, VertexSlot<V>>();
  private readonly edgeSlots = new Map<EdgeId, EdgeSlot<E>>();
  private nextVertexId: VertexId = 0;
  private nextEdgeId: EdgeId = 0;

  vertexCount(): number {
    return this.vertexSlots.size;
  }

  edgeCount(): number {
    return this.edgeSlots.size;
  }

  vertices(): IterableIterator<VertexId> {
    return this.vertexSlots.keys();
  }

  edges(): IterableIterator<EdgeId> {
    return this.edgeSlots.keys();
  }

  hasVertex(vertex: VertexId): boolean {
    return this.vertexSlots.has(vertex);
  }

  hasEdge(edge: EdgeId): boolean {
    return this.edgeSlots.has(edge);
  }

  addVertex(element: V): VertexId {
    const id = this.nextVertexId;
    this.nextVertexId += 1;
    this.vertexSlots.set(id, { element, incident: new Set() });
    return id;
  }

  addEdge(from: VertexId, to: VertexId, element: E): EdgeId {
    const fromSlot = this.vertexSlot(from);
    const toSlot = this.vertexSlot(to);
    if (from === to) {
      throw new Error(`Self-loop edges are not supported (vertex ${from})`);
    }

    const id = this.nextEdgeId;
    this.nextEdgeId += 1;
    this.edgeSlots.set(id, { element, endpoints: [from, to] });
    fromSlot.incident.add(id);
    toSlot.incident.add(id);
    return id;
  }

  removeVertex(vertex: VertexId): V {
    const slot = this.vertexSlot(vertex);
    for (const edge of [...slot.incident]) {
      this.removeEdge(edge);
    }
    this.vertexSlots.delete(vertex);
    return slot.element;
  }

  removeEdge(edge: EdgeId): E {
    const slot = this.edgeSlot(edge);
    for (const vertex of slot.endpoints) {
      this.vertexSlots.get(vertex)?.incident.delete(edge);
    }
    this.edgeSlots.delete(edge);
    return slot.element;
  }

  vertexElement(vertex: VertexId): V {
    return this.vertexSlot(vertex).element;
  }

  edgeElement(edge: EdgeId): E {
    return this.edgeSlot(edge).element;
  }

  replaceVertex(vertex: VertexId, element: V): V {
    const slot = this.vertexSlot(vertex);
    const previous = slot.element;
    slot.element = element;
    return previous;
  }

  replaceEdge(edge: EdgeId, element: E): E {
    const slot = this.edgeSlot(edge);
    const previous = slot.element;
    slot.element = element;
    return previous;
  }

  endpoints(edge: EdgeId): readonly [VertexId, VertexId] {
    return this.edgeSlot(edge).endpoints;
  }

  opposite(vertex: VertexId, edge: EdgeId): VertexId {
    this.vertexSlot(vertex);
    const [a, b] = this.edgeSlot(edge).endpoints;
    if (a === vertex) {
      return b;
    }
    if (b === vertex) {
      return a;
    }
    throw new Error(`Edge ${edge} is not incident to vertex ${vertex}`);
  }

  incidentEdges(vertex: VertexId): EdgeId[] {
    return [...this.vertexSlot(vertex).incident];
  }

  vertexDegree(vertex: VertexId): number {
    return this.vertexSlot(vertex).incident.size;
  }

  areAdjacent(a: VertexId, b: VertexId): boolean {
    const slotA = this.vertexSlot(a);
    const slotB = this.vertexSlot(b);
    if (a === b) {
      return false;
    }
    const [smaller, other] = slotA.incident.size <= slotB.incident.size ? [slotA, b] : [slotB, a];
    for (const edge of smaller.incident) {
      const [from, to] = this.edgeSlot(edge).endpoints;
      if (from === other || to === other) {
        return true;
      }
    }
    return false;
  }

  private vertexSlot(vertex: VertexId): VertexSlot<V> {
    const slot = this.vertexSlots.get(vertex);
    if (!slot) {
      throw new Error(`Vertex ${vertex} is not part of this graph`);
    }
    return slot;
  }

  private edgeSlot(edge: EdgeId): EdgeSlot<E> {
    const slot = this.edgeSlots.get(edge);
    if (!slot) {
      throw new Error(`Edge ${edge} is not part of this graph`);
    }
    return slot;
  }
}
