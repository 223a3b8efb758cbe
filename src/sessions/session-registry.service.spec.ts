import { colorForUser, PRESENCE_COLORS, SessionRegistryService } from './session-registry.service';

const t = (seconds: number) => new Date(Date.UTC(2024, 0, 1, 0, 0, seconds));

const alice = { userId: 'user-alice', displayName: 'Alice', email: null };
const bob = { userId: 'user-bob', displayName: 'Bob', email: 'bob@example.test' };

describe('SessionRegistryService', () => {
  let registry: SessionRegistryService;

  beforeEach(() => {
    registry = new SessionRegistryService();
  });

  it('walks a connection through its states', () => {
    expect(registry.register('c1', alice, t(0)).state).toBe('connecting');
    expect(registry.join('c1', 10, t(1))).toMatchObject({
      state: 'joined',
      ontologyId: 10,
      joinedAt: t(1),
    });
    expect(registry.setView('c1', 'Tree', t(2))).toMatchObject({
      state: 'viewing',
      currentView: 'Tree',
    });
    expect(registry.leave('c1')).toMatchObject({
      state: 'connecting',
      ontologyId: null,
      currentView: null,
    });
    expect(registry.remove('c1')?.state).toBe('disconnected');
    expect(registry.size).toBe(0);
  });

  it('lists joined sessions of one ontology by join time', () => {
    registry.register('c1', alice, t(0));
    registry.register('c2', bob, t(0));
    registry.register('c3', bob, t(0));
    registry.join('c2', 10, t(1));
    registry.join('c1', 10, t(2));

    expect(registry.listByOntology(10).map((p) => p.connectionId)).toEqual(['c2', 'c1']);
    expect(registry.listByOntology(11)).toEqual([]);
  });

  it('finds joined sessions not seen since the cutoff', () => {
    registry.register('c1', alice, t(0));
    registry.register('c2', bob, t(0));
    registry.join('c1', 10, t(1));
    registry.join('c2', 10, t(1));
    registry.touch('c2', t(50));

    expect(registry.findStale(t(30)).map((e) => e.connectionId)).toEqual(['c1']);
  });

  it('hands out copies', () => {
    registry.register('c1', alice, t(0));
    const copy = registry.require('c1');
    copy.currentView = 'changed';

    expect(registry.get('c1')?.currentView).toBeNull();
  });

  it('reports an unknown connection', () => {
    expect(() => registry.require('nope')).toThrow('Connection nope not found');
  });
});

describe('colorForUser', () => {
  it('picks a stable palette entry', () => {
    expect(colorForUser('a')).toBe('#bfef45');
    expect(PRESENCE_COLORS).toContain(colorForUser('user-bob'));
  });
});
