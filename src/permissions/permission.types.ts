import { ChangeOp } from '../graph-store/types/graph.types';
import { PermissionLevel } from '../database/repositories/domain.types';

export enum OntologyAction {
  View = 'View',
  Add = 'Add',
  Edit = 'Edit',
  Manage = 'Manage',
}

export type Authorization =
  | { allowed: true }
  | { allowed: false; deniedReason: string };

// Minimum share level per action
export const REQUIRED_LEVEL: Record<OntologyAction, PermissionLevel> = {
  [OntologyAction.View]: PermissionLevel.View,
  [OntologyAction.Add]: PermissionLevel.ViewAndAdd,
  [OntologyAction.Edit]: PermissionLevel.ViewAddEdit,
  [OntologyAction.Manage]: PermissionLevel.FullAccess,
};

const ACTION_BY_OP: Record<ChangeOp, OntologyAction> = {
  create: OntologyAction.Add,
  update: OntologyAction.Edit,
  delete: OntologyAction.Manage,
};

export function actionForChange(op: ChangeOp): OntologyAction {
  return ACTION_BY_OP[op];
}

// Every group operation edits layout state
export const GROUP_ACTION = OntologyAction.Edit;
