export * from './change.dto';
export * from './concept-change.dto';
export * from './group-change.dto';
export * from './individual-change.dto';
export * from './ontology-scoped.dto';
export * from './presence.dto';
export * from './relationship-change.dto';
