import { readFileSync } from 'fs';
import { createConnection } from 'mysql2/promise';
import { join } from 'path';

interface SampleOntology {
  users: Array<{ id: string; displayName: string; email: string | null }>;
  ontology: {
    id: number;
    name: string;
    ownerId: string;
    visibility: 'private' | 'public';
    allowPublicEdit: boolean;
  };
  shares: Array<{ userId: string; permissionLevel: number }>;
  concepts: Array<{
    id: number;
    name: string;
    category?: string;
    positionX?: number;
    positionY?: number;
  }>;
  relationships: Array<{ id: number; source: number; target: number; relationType: string }>;
  individuals: Array<{ id: number; conceptTypeId: number; name: string }>;
  individualRelationships: Array<{
    id: number;
    source: number;
    target: number;
    relationType: string;
  }>;
  groups: Array<{
    id: number;
    parentConceptId: number;
    childConceptIds: number[];
    groupName: string | null;
  }>;
}

// Rows of one ontology, deleted before reseeding
const ENTITY_TABLES = [
  'individual_relationships',
  'individuals',
  'concept_groups',
  'relationships',
  'concepts',
  'ontology_shares',
];

async function main() {
  const connection = await createConnection({
    host: process.env.DATABASE_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || '3306'),
    user: process.env.DATABASE_USER || 'root',
    password: process.env.DATABASE_PASSWORD || '',
    database: process.env.DATABASE_NAME || 'ontology_collab',
    // schema.sql holds several statements
    multipleStatements: true,
  });

  try {
    console.log('🧱 Applying schema...');
    await connection.query(
      readFileSync(join(__dirname, '../src/db/schema.sql'), 'utf-8'),
    );

    console.log('📥 Loading sample ontology...');
    const data: SampleOntology = JSON.parse(
      readFileSync(join(__dirname, '../docs/sample-data/ontology.json'), 'utf-8'),
    );
    const ontologyId = data.ontology.id;
    const now = new Date();

    console.log(`🗑️  Clearing ontology ${ontologyId}...`);
    for (const table of ENTITY_TABLES) {
      await connection.execute(`DELETE FROM ${table} WHERE ontology_id = ?`, [ontologyId]);
    }
    await connection.execute('DELETE FROM ontologies WHERE id = ?', [ontologyId]);

    for (const user of data.users) {
      await connection.execute(
        'INSERT INTO users (id, display_name, email) VALUES (?, ?, ?) ON DUPLICATE KEY UPDATE display_name = VALUES(display_name), email = VALUES(email)',
        [user.id, user.displayName, user.email],
      );
    }

    // Sequence 0: the sample is the ontology's starting state
    await connection.execute(
      'INSERT INTO ontologies (id, name, owner_id, visibility, allow_public_edit, graph_sequence) VALUES (?, ?, ?, ?, ?, 0)',
      [
        ontologyId,
        data.ontology.name,
        data.ontology.ownerId,
        data.ontology.visibility,
        data.ontology.allowPublicEdit ? 1 : 0,
      ],
    );

    for (const share of data.shares) {
      await connection.execute(
        'INSERT INTO ontology_shares (ontology_id, user_id, permission_level, is_active) VALUES (?, ?, ?, 1)',
        [ontologyId, share.userId, share.permissionLevel],
      );
    }

    console.log(`📝 Importing ${data.concepts.length} concepts...`);
    for (const c of data.concepts) {
      await connection.execute(
        'INSERT INTO concepts (ontology_id, id, name, category, color, definition, position_x, position_y, version, created_at, updated_at) VALUES (?, ?, ?, ?, NULL, NULL, ?, ?, 1, ?, ?)',
        [ontologyId, c.id, c.name, c.category ?? null, c.positionX ?? null, c.positionY ?? null, now, now],
      );
    }

    console.log(`🔗 Importing ${data.relationships.length} relationships...`);
    for (const r of data.relationships) {
      await connection.execute(
        'INSERT INTO relationships (ontology_id, id, source_concept_id, target_concept_id, relation_type, label, version, created_at, updated_at) VALUES (?, ?, ?, ?, ?, NULL, 1, ?, ?)',
        [ontologyId, r.id, r.source, r.target, r.relationType, now, now],
      );
    }

    for (const i of data.individuals) {
      await connection.execute(
        'INSERT INTO individuals (ontology_id, id, concept_type_id, name, label, description, version, created_at, updated_at) VALUES (?, ?, ?, ?, NULL, NULL, 1, ?, ?)',
        [ontologyId, i.id, i.conceptTypeId, i.name, now, now],
      );
    }

    for (const r of data.individualRelationships) {
      await connection.execute(
        'INSERT INTO individual_relationships (ontology_id, id, source_individual_id, target_individual_id, relation_type, version, created_at, updated_at) VALUES (?, ?, ?, ?, ?, 1, ?, ?)',
        [ontologyId, r.id, r.source, r.target, r.relationType, now, now],
      );
    }

    // Seeded expanded; collapsing captures the boundary records
    for (const g of data.groups) {
      await connection.execute(
        "INSERT INTO concept_groups (ontology_id, id, created_by, parent_concept_id, child_concept_ids, collapsed_relationships, is_collapsed, group_name, version, created_at, updated_at) VALUES (?, ?, ?, ?, ?, '[]', 0, ?, 1, ?, ?)",
        [
          ontologyId,
          g.id,
          data.ontology.ownerId,
          g.parentConceptId,
          JSON.stringify(g.childConceptIds),
          g.groupName,
          now,
          now,
        ],
      );
    }

    console.log('✅ Sample ontology seeded.');
  } catch (error) {
    console.error('\n❌ Seed failed:', error);
    process.exit(1);
  } finally {
    await connection.end();
  }
}

main().catch((error) => {
  console.error('❌ Could not connect:', error);
  process.exit(1);
});
