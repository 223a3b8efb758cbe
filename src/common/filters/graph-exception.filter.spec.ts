import { Logger } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GraphError } from '../errors/graph-error';
import { GraphExceptionFilter } from './graph-exception.filter';

describe('GraphExceptionFilter', () => {
  const filter = new GraphExceptionFilter();

  function send(error: GraphError) {
    const response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
    filter.catch(error, new ExecutionContextHost([{}, response]));
    return response;
  }

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it.each([
    ['PermissionDenied', 403],
    ['NotFound', 404],
    ['GroupNotFound', 404],
    ['ValidationFailed', 400],
    ['InvalidReference', 422],
    ['CircularReference', 409],
    ['StaleState', 409],
  ] as const)('maps %s to %d', (code, status) => {
    const response = send(new GraphError(code, 'nope'));

    expect(response.status).toHaveBeenCalledWith(status);
    expect(response.json).toHaveBeenCalledWith({ statusCode: status, code, message: 'nope' });
  });
});
