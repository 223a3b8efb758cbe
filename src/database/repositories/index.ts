export * from './concept-group.repository';
export * from './concept.repository';
export * from './domain.types';
export * from './individual-relationship.repository';
export * from './individual.repository';
export * from './ontology.repository';
export * from './relationship.repository';
export * from './user.repository';
