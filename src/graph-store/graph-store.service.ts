import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { CLOCK, Clock } from '../common/clock';
import { GraphError } from '../common/errors/graph-error';
import { SerialQueue } from '../common/utils/serial-queue';
import { GroupingEngine } from '../grouping/grouping-engine';
import { GroupValidation } from '../grouping/grouping.types';
import { projectVisibleGraph, VisibleGraph } from '../grouping/visible-graph';
import { GraphPersistence, isEmptyDelta } from './graph-persistence';
import { OntologyGraph } from './ontology-graph';
import {
  CommitOrigin,
  Committed,
  ConceptChange,
  ConceptCommit,
  GraphCommitEvent,
  GraphDelta,
  GraphSnapshot,
  GroupChange,
  GroupCommit,
  IndividualChange,
  IndividualCommit,
  IndividualRelationshipChange,
  IndividualRelationshipCommit,
  RelationshipChange,
  RelationshipCommit,
} from './types/graph.types';

interface LoadedOntology {
  ontologyId: number;
  graph: Promise<OntologyGraph>;
  // Mutations, strictly one at a time
  mutations: SerialQueue;
  // Persistence of committed deltas, outside the mutation queue
  writeBehind: SerialQueue;
  // Rows of a rejected write are waiting to be written again
  unsaved: boolean;
}

/**
 * Canonical in-memory graphs, one per ontology, hydrated on first use.
 *
 * Every mutation runs on the ontology's own queue, gets the next sequence
 * number and is published on `commits$` before the queue moves on, so
 * subscribers observe commits in sequence order. Persistence happens later on
 * a separate write-behind queue; rows of a rejected write are marked changed
 * again and go out with the next write or `flush()`.
 */
@Injectable()
export class GraphStoreService implements OnModuleDestroy {
  private readonly logger = new Logger(GraphStoreService.name);
  private readonly ontologies = new Map<number, LoadedOntology>();
  private readonly commitsSubject = new Subject<GraphCommitEvent>();

  readonly commits$: Observable<GraphCommitEvent> =
    this.commitsSubject.asObservable();

  constructor(
    private readonly persistence: GraphPersistence,
    private readonly engine: GroupingEngine,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  // ============================================
  // READS
  // ============================================

  async snapshot(ontologyId: number): Promise<GraphSnapshot> {
    const graph = await this.load(ontologyId);
    return graph.snapshot();
  }

  async visibleGraph(ontologyId: number): Promise<VisibleGraph> {
    const graph = await this.load(ontologyId);
    return projectVisibleGraph(graph.snapshot());
  }

  async canCreateGroup(
    ontologyId: number,
    parentConceptId: number,
    childConceptIds: number[],
  ): Promise<boolean> {
    const graph = await this.load(ontologyId);
    return this.engine.canCreateGroup(graph, parentConceptId, childConceptIds);
  }

  async validateGroup(
    ontologyId: number,
    parentConceptId: number,
    childConceptIds: number[],
  ): Promise<GroupValidation> {
    const graph = await this.load(ontologyId);
    return this.engine.validateGroup(graph, parentConceptId, childConceptIds);
  }

  // ============================================
  // MUTATIONS
  // ============================================

  applyConceptChange(
    ontologyId: number,
    change: ConceptChange,
    origin: CommitOrigin,
  ): Promise<Committed<ConceptCommit>> {
    return this.commit(
      ontologyId,
      origin,
      (graph, now): ConceptCommit => {
        const result = graph.applyConceptChange(change, now);
        if (result.changeType !== 'deleted') {
          return { changeType: result.changeType, concept: result.concept, cascade: null };
        }
        const fixups = this.engine.onConceptDeleted(graph, result.concept.id, now);
        return {
          changeType: 'deleted',
          concept: result.concept,
          cascade: {
            deletedRelationshipIds: result.deletedRelationshipIds,
            deletedIndividualIds: result.deletedIndividualIds,
            deletedIndividualRelationshipIds: result.deletedIndividualRelationshipIds,
            ...fixups,
          },
        };
      },
      (committed) => ({ ...committed, kind: 'concept' }),
    );
  }

  applyRelationshipChange(
    ontologyId: number,
    change: RelationshipChange,
    origin: CommitOrigin,
  ): Promise<Committed<RelationshipCommit>> {
    return this.commit(
      ontologyId,
      origin,
      (graph, now): RelationshipCommit => {
        const result = graph.applyRelationshipChange(change, now);
        return {
          ...result,
          updatedGroups: this.engine.syncRelationship(
            graph,
            result.relationship.id,
            now,
          ),
        };
      },
      (committed) => ({ ...committed, kind: 'relationship' }),
    );
  }

  applyIndividualChange(
    ontologyId: number,
    change: IndividualChange,
    origin: CommitOrigin,
  ): Promise<Committed<IndividualCommit>> {
    return this.commit(
      ontologyId,
      origin,
      (graph, now) => graph.applyIndividualChange(change, now),
      (committed) => ({ ...committed, kind: 'individual' }),
    );
  }

  applyIndividualRelationshipChange(
    ontologyId: number,
    change: IndividualRelationshipChange,
    origin: CommitOrigin,
  ): Promise<Committed<IndividualRelationshipCommit>> {
    return this.commit(
      ontologyId,
      origin,
      (graph, now) => graph.applyIndividualRelationshipChange(change, now),
      (committed) => ({ ...committed, kind: 'individual-relationship' }),
    );
  }

  applyGroupChange(
    ontologyId: number,
    change: GroupChange,
    origin: CommitOrigin,
  ): Promise<Committed<GroupCommit>> {
    return this.commit(
      ontologyId,
      origin,
      (graph, now) => this.engine.applyGroupChange(graph, change, origin.userId, now),
      (committed) => ({ ...committed, kind: 'group' }),
    );
  }

  /** Waits until every committed change so far has been handed to storage. */
  async flush(ontologyId?: number): Promise<void> {
    const targets =
      ontologyId === undefined
        ? Array.from(this.ontologies.values())
        : [this.ontologies.get(ontologyId)].filter(
            (entry): entry is LoadedOntology => entry !== undefined,
          );
    for (const entry of targets) {
      await entry.mutations.drain();
      await entry.writeBehind.drain();
      if (entry.unsaved) await this.retryUnsaved(entry);
    }
  }

  loadedOntologyIds(): number[] {
    return Array.from(this.ontologies.keys()).sort((a, b) => a - b);
  }

  /**
   * Drops an ontology from memory once everything it committed is stored.
   * Returns false, keeping it loaded, while work is queued or rows are unsaved.
   */
  async unload(ontologyId: number): Promise<boolean> {
    const entry = this.ontologies.get(ontologyId);
    if (!entry) return false;

    await this.flush(ontologyId);
    if (
      this.ontologies.get(ontologyId) !== entry ||
      entry.unsaved ||
      entry.mutations.size > 0 ||
      entry.writeBehind.size > 0
    ) {
      return false;
    }

    this.ontologies.delete(ontologyId);
    entry.mutations.close();
    entry.writeBehind.close();
    this.logger.log(`📤 Unloaded ontology ${ontologyId}`);
    return true;
  }

  async onModuleDestroy(): Promise<void> {
    await this.flush();
    for (const entry of this.ontologies.values()) {
      entry.mutations.close();
      entry.writeBehind.close();
    }
    this.commitsSubject.complete();
  }

  // ============================================
  // INTERNALS
  // ============================================

  private commit<T>(
    ontologyId: number,
    origin: CommitOrigin,
    mutate: (graph: OntologyGraph, now: Date) => T,
    toEvent: (committed: Committed<T>) => GraphCommitEvent,
  ): Promise<Committed<T>> {
    const entry = this.entry(ontologyId);

    return entry.mutations.run(async () => {
      const graph = await entry.graph;
      const now = this.clock();
      const commit = mutate(graph, now);

      const committed: Committed<T> = {
        ontologyId,
        sequence: graph.nextSequence(),
        committedAt: now,
        origin,
        commit,
      };
      const delta = graph.takeDelta();

      this.commitsSubject.next(toEvent(committed));

      if (!isEmptyDelta(delta)) {
        void this.persistLater(entry, graph, committed.sequence, delta);
      }
      return committed;
    });
  }

  private persistLater(
    entry: LoadedOntology,
    graph: OntologyGraph,
    sequence: number,
    delta: GraphDelta,
  ): Promise<void> {
    return entry.writeBehind.run(async () => {
      try {
        await this.persistence.persist(entry.ontologyId, sequence, delta);
      } catch (error) {
        this.logger.error(
          `❌ Failed to persist commit ${sequence} of ontology ${entry.ontologyId}`,
          error instanceof Error ? error.stack : String(error),
        );
        graph.restoreDelta(delta);
        entry.unsaved = true;
      }
    });
  }

  private async retryUnsaved(entry: LoadedOntology): Promise<void> {
    entry.unsaved = false;
    await entry.mutations.run(async () => {
      const graph = await entry.graph;
      const delta = graph.takeDelta();
      if (!isEmptyDelta(delta)) {
        void this.persistLater(entry, graph, graph.sequence, delta);
      }
    });
    await entry.writeBehind.drain();
  }

  private load(ontologyId: number): Promise<OntologyGraph> {
    return this.entry(ontologyId).graph;
  }

  private entry(ontologyId: number): LoadedOntology {
    const existing = this.ontologies.get(ontologyId);
    if (existing) return existing;

    const entry: LoadedOntology = {
      ontologyId,
      graph: this.hydrate(ontologyId),
      mutations: new SerialQueue(),
      writeBehind: new SerialQueue(),
      unsaved: false,
    };
    this.ontologies.set(ontologyId, entry);

    // A failed load is retried on the next request
    entry.graph.catch(() => {
      if (this.ontologies.get(ontologyId) === entry) {
        this.ontologies.delete(ontologyId);
        entry.mutations.close();
        entry.writeBehind.close();
      }
    });
    return entry;
  }

  private async hydrate(ontologyId: number): Promise<OntologyGraph> {
    const snapshot = await this.persistence.loadOntology(ontologyId);
    if (!snapshot) throw GraphError.notFound('Ontology', ontologyId);
    return OntologyGraph.fromSnapshot(snapshot);
  }
}
