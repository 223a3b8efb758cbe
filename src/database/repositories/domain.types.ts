// Domain shapes for the access-control tables. Graph entities use the
// graph-store types directly.

export interface DomainUser {
  id: string;
  displayName: string;
  email: string | null;
  createdAt: Date;
}

export type OntologyVisibility = 'private' | 'public';

export interface DomainOntology {
  id: number;
  name: string;
  ownerId: string;
  visibility: OntologyVisibility;
  allowPublicEdit: boolean;
  graphSequence: number;
  createdAt: Date;
  updatedAt: Date;
}

export enum PermissionLevel {
  View = 0,
  ViewAndAdd = 1,
  ViewAddEdit = 2,
  FullAccess = 3,
}

export interface DomainShare {
  ontologyId: number;
  userId: string;
  permissionLevel: PermissionLevel;
  isActive: boolean;
}
