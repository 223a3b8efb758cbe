import { GraphDelta, GraphSnapshot } from './types/graph.types';

/**
 * Storage behind the in-memory graphs. `loadOntology` returns null for an
 * ontology that does not exist; `persist` writes one commit's delta.
 */
export abstract class GraphPersistence {
  abstract loadOntology(ontologyId: number): Promise<GraphSnapshot | null>;

  abstract persist(
    ontologyId: number,
    sequence: number,
    delta: GraphDelta,
  ): Promise<void>;
}

export function isEmptyDelta(delta: GraphDelta): boolean {
  return Object.values(delta).every(
    (table) => table.upserted.length === 0 && table.deletedIds.length === 0,
  );
}
