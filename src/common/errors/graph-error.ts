export type GraphErrorCode =
  | 'PermissionDenied'
  | 'NotFound'
  | 'InvalidReference'
  | 'AlreadyGrouped'
  | 'CircularReference'
  | 'DepthExceeded'
  | 'StaleState'
  | 'Conflict'
  | 'GroupNotFound'
  | 'ValidationFailed';

/**
 * Structured failure of a graph read or mutation.
 *
 * Thrown by the store, the grouping engine and the hub; the gateway turns it
 * into a rejected reply and the HTTP filter into a status code. A mutation
 * that throws one has left no trace in the graph.
 */
export class GraphError extends Error {
  constructor(
    readonly code: GraphErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'GraphError';
  }

  static notFound(entity: string, id: number | string): GraphError {
    return new GraphError('NotFound', `${entity} ${id} not found`);
  }

  static permissionDenied(reason: string): GraphError {
    return new GraphError('PermissionDenied', reason);
  }

  toJSON(): { code: GraphErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export function isGraphError(value: unknown): value is GraphError {
  return value instanceof GraphError;
}
