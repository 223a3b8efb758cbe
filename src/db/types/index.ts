import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// MySQL TINYINT(1) flags come back as 0 | 1
export type Flag = number;

export interface UsersTable {
  id: string;
  display_name: string;
  email: string | null;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface OntologiesTable {
  id: Generated<number>;
  name: string;
  owner_id: string;
  visibility: 'private' | 'public';
  allow_public_edit: Generated<Flag>;
  graph_sequence: Generated<number>;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface OntologySharesTable {
  id: Generated<number>;
  ontology_id: number;
  user_id: string;
  // 0 View, 1 ViewAndAdd, 2 ViewAddEdit, 3 FullAccess
  permission_level: number;
  is_active: Generated<Flag>;
  created_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

interface EntityColumns {
  ontology_id: number;
  id: number;
  version: number;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface ConceptsTable extends EntityColumns {
  name: string;
  category: string | null;
  color: string | null;
  definition: string | null;
  position_x: number | null;
  position_y: number | null;
}

export interface RelationshipsTable extends EntityColumns {
  source_concept_id: number;
  target_concept_id: number;
  relation_type: string;
  label: string | null;
}

export interface IndividualsTable extends EntityColumns {
  concept_type_id: number;
  name: string;
  label: string | null;
  description: string | null;
}

export interface IndividualRelationshipsTable extends EntityColumns {
  source_individual_id: number;
  target_individual_id: number;
  relation_type: string;
}

export interface ConceptGroupsTable extends EntityColumns {
  created_by: string;
  parent_concept_id: number;
  // JSON text columns
  child_concept_ids: string;
  collapsed_relationships: string;
  is_collapsed: Flag;
  group_name: string | null;
}

export interface DB {
  users: UsersTable;
  ontologies: OntologiesTable;
  ontology_shares: OntologySharesTable;
  concepts: ConceptsTable;
  relationships: RelationshipsTable;
  individuals: IndividualsTable;
  individual_relationships: IndividualRelationshipsTable;
  concept_groups: ConceptGroupsTable;
}
