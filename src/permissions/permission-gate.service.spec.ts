import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  DomainOntology,
  DomainShare,
  DomainUser,
  OntologyRepository,
  PermissionLevel,
  UserRepository,
} from '../database/repositories';
import { PermissionGateService } from './permission-gate.service';
import { actionForChange, OntologyAction } from './permission.types';

const at = new Date('2024-01-01T00:00:00.000Z');

const user = (id: string): DomainUser => ({
  id,
  displayName: id,
  email: null,
  createdAt: at,
});

const ontology = (id: number, overrides: Partial<DomainOntology>): DomainOntology => ({
  id,
  name: `Ontology ${id}`,
  ownerId: 'user-alice',
  visibility: 'private',
  allowPublicEdit: false,
  graphSequence: 0,
  createdAt: at,
  updatedAt: at,
  ...overrides,
});

const users = new Map(
  ['user-alice', 'user-bob', 'user-carol', 'user-dave'].map((id) => [id, user(id)]),
);
const ontologies = new Map([
  [1, ontology(1, {})],
  [2, ontology(2, { visibility: 'public' })],
  [3, ontology(3, { visibility: 'public', allowPublicEdit: true })],
]);
const shares: DomainShare[] = [
  { ontologyId: 1, userId: 'user-bob', permissionLevel: PermissionLevel.ViewAddEdit, isActive: true },
  { ontologyId: 1, userId: 'user-carol', permissionLevel: PermissionLevel.View, isActive: true },
];

describe('PermissionGateService', () => {
  let gate: PermissionGateService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        PermissionGateService,
        {
          provide: UserRepository,
          useValue: { findById: async (id: string) => users.get(id) ?? null },
        },
        {
          provide: OntologyRepository,
          useValue: {
            findById: async (id: number) => ontologies.get(id) ?? null,
            findActiveShare: async (ontologyId: number, userId: string) =>
              shares.find((s) => s.ontologyId === ontologyId && s.userId === userId) ??
              null,
          },
        },
      ],
    }).compile();

    gate = moduleRef.get(PermissionGateService);
  });

  afterEach(() => jest.restoreAllMocks());

  const cases: Array<[string, number, OntologyAction, boolean]> = [
    ['user-alice', 1, OntologyAction.Manage, true],
    ['user-bob', 1, OntologyAction.Edit, true],
    ['user-bob', 1, OntologyAction.Manage, false],
    ['user-carol', 1, OntologyAction.View, true],
    ['user-carol', 1, OntologyAction.Add, false],
    ['user-dave', 1, OntologyAction.View, false],
    ['user-dave', 2, OntologyAction.View, true],
    ['user-dave', 2, OntologyAction.Edit, false],
    ['user-dave', 3, OntologyAction.Edit, true],
    ['user-dave', 3, OntologyAction.Manage, false],
  ];

  it.each(cases)('%s on ontology %d may %s: %s', async (userId, ontologyId, action, allowed) => {
    const result = await gate.authorize(userId, ontologyId, action);

    expect(result.allowed).toBe(allowed);
  });

  it('names the user, action and ontology when denying', async () => {
    expect(await gate.authorize('user-bob', 1, OntologyAction.Manage)).toEqual({
      allowed: false,
      deniedReason: 'User user-bob may not Manage ontology 1',
    });
  });

  it('denies unknown users and ontologies', async () => {
    expect(await gate.authorize('ghost', 1, OntologyAction.View)).toEqual({
      allowed: false,
      deniedReason: 'Unknown user ghost',
    });
    expect(await gate.authorize('user-alice', 9, OntologyAction.View)).toEqual({
      allowed: false,
      deniedReason: 'Unknown ontology 9',
    });
  });

  it('throws PermissionDenied from assertAllowed and logs it', async () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    await expect(
      gate.assertAllowed('user-carol', 1, OntologyAction.Add),
    ).rejects.toMatchObject({
      code: 'PermissionDenied',
      message: 'User user-carol may not Add ontology 1',
    });
    expect(warn).toHaveBeenCalledWith('🚫 User user-carol may not Add ontology 1');
  });

  it('maps change operations to actions', () => {
    expect(actionForChange('create')).toBe(OntologyAction.Add);
    expect(actionForChange('update')).toBe(OntologyAction.Edit);
    expect(actionForChange('delete')).toBe(OntologyAction.Manage);
  });
});
