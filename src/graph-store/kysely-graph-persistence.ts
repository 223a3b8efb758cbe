import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import {
  ConceptGroupRepository,
  ConceptRepository,
  IndividualRelationshipRepository,
  IndividualRepository,
  OntologyRepository,
  RelationshipRepository,
} from '../database/repositories';
import { GraphPersistence } from './graph-persistence';
import { GraphDelta, GraphSnapshot } from './types/graph.types';

@Injectable()
export class KyselyGraphPersistence extends GraphPersistence {
  private readonly logger = new Logger(KyselyGraphPersistence.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly ontologyRepository: OntologyRepository,
    private readonly conceptRepository: ConceptRepository,
    private readonly relationshipRepository: RelationshipRepository,
    private readonly individualRepository: IndividualRepository,
    private readonly individualRelationshipRepository: IndividualRelationshipRepository,
    private readonly conceptGroupRepository: ConceptGroupRepository,
  ) {
    super();
  }

  async loadOntology(ontologyId: number): Promise<GraphSnapshot | null> {
    const ontology = await this.ontologyRepository.findById(ontologyId);
    if (!ontology) return null;

    const startTime = Date.now();
    // Hydration reads the Primary so a fresh replica cannot hand back stale rows
    const db = this.databaseService.db.write();
    const [concepts, relationships, individuals, individualRelationships, groups] =
      await Promise.all([
        this.conceptRepository.findByOntology(ontologyId, db),
        this.relationshipRepository.findByOntology(ontologyId, db),
        this.individualRepository.findByOntology(ontologyId, db),
        this.individualRelationshipRepository.findByOntology(ontologyId, db),
        this.conceptGroupRepository.findByOntology(ontologyId, db),
      ]);

    this.logger.log(
      `📥 Loaded ontology ${ontologyId}: ${concepts.length} concepts, ${relationships.length} relationships, ${groups.length} groups (${Date.now() - startTime}ms)`,
    );

    return {
      ontologyId,
      sequence: ontology.graphSequence,
      concepts,
      relationships,
      individuals,
      individualRelationships,
      groups,
    };
  }

  async persist(
    ontologyId: number,
    sequence: number,
    delta: GraphDelta,
  ): Promise<void> {
    await this.databaseService.db.transaction(async (trx) => {
      // Dependents first on delete, owners first on upsert
      await this.individualRelationshipRepository.deleteMany(
        ontologyId,
        delta.individualRelationships.deletedIds,
        trx,
      );
      await this.individualRepository.deleteMany(
        ontologyId,
        delta.individuals.deletedIds,
        trx,
      );
      await this.conceptGroupRepository.deleteMany(
        ontologyId,
        delta.groups.deletedIds,
        trx,
      );
      await this.relationshipRepository.deleteMany(
        ontologyId,
        delta.relationships.deletedIds,
        trx,
      );
      await this.conceptRepository.deleteMany(
        ontologyId,
        delta.concepts.deletedIds,
        trx,
      );

      await this.conceptRepository.upsertMany(delta.concepts.upserted, trx);
      await this.relationshipRepository.upsertMany(
        delta.relationships.upserted,
        trx,
      );
      await this.individualRepository.upsertMany(delta.individuals.upserted, trx);
      await this.individualRelationshipRepository.upsertMany(
        delta.individualRelationships.upserted,
        trx,
      );
      await this.conceptGroupRepository.upsertMany(delta.groups.upserted, trx);

      await this.ontologyRepository.updateGraphSequence(ontologyId, sequence, trx);
    });
  }
}
