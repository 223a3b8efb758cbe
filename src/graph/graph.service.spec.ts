import { Test } from '@nestjs/testing';
import { GraphError } from '../common/errors/graph-error';
import { GraphStoreService } from '../graph-store/graph-store.service';
import { PermissionGateService } from '../permissions/permission-gate.service';
import { OntologyAction } from '../permissions/permission.types';
import { SyncHubService } from '../sync/sync-hub.service';
import { GraphService } from './graph.service';

describe('GraphService', () => {
  let service: GraphService;
  const assertAllowed = jest.fn();
  const validateGroup = jest.fn();

  beforeEach(async () => {
    assertAllowed.mockReset().mockResolvedValue(undefined);
    validateGroup.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        GraphService,
        { provide: GraphStoreService, useValue: { validateGroup } },
        { provide: PermissionGateService, useValue: { assertAllowed } },
        { provide: SyncHubService, useValue: { presence: jest.fn() } },
      ],
    }).compile();
    service = moduleRef.get(GraphService);
  });

  it('reports a refused grouping with its reason', async () => {
    validateGroup.mockResolvedValue({
      ok: false,
      code: 'AlreadyGrouped',
      message: 'Concept 2 already belongs to group 1',
    });

    expect(await service.canCreateGroup('user-1', 10, 1, [2])).toEqual({
      allowed: false,
      code: 'AlreadyGrouped',
      reason: 'Concept 2 already belongs to group 1',
    });
    expect(assertAllowed).toHaveBeenCalledWith('user-1', 10, OntologyAction.View);
    expect(validateGroup).toHaveBeenCalledWith(10, 1, [2]);
  });

  it('reports an allowed grouping', async () => {
    validateGroup.mockResolvedValue({ ok: true });

    expect(await service.canCreateGroup('user-1', 10, 1, [3])).toEqual({ allowed: true });
  });

  it('checks View before reading', async () => {
    assertAllowed.mockRejectedValue(GraphError.permissionDenied('nope'));

    await expect(service.canCreateGroup('user-1', 10, 1, [2])).rejects.toMatchObject({
      code: 'PermissionDenied',
    });
    expect(validateGroup).not.toHaveBeenCalled();
  });
});
