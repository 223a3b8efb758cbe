import { layoutExpandedChildren } from './expansion-layout';

describe('layoutExpandedChildren', () => {
  it('spreads children around the parent when nothing is nearby', () => {
    expect(layoutExpandedChildren({ x: 0, y: 0 }, [7, 8], [])).toEqual([
      { conceptId: 7, x: 150, y: 0 },
      { conceptId: 8, x: -150, y: 0 },
    ]);
  });

  it('moves a child away from an occupied spot', () => {
    expect(layoutExpandedChildren({ x: 0, y: 0 }, [7], [{ x: 150, y: 0 }])).toEqual([
      { conceptId: 7, x: -150, y: 0 },
    ]);
  });

  it('honours a custom radius around an offset center', () => {
    expect(
      layoutExpandedChildren({ x: 10, y: 20 }, [3], [], { radius: 50 }),
    ).toEqual([{ conceptId: 3, x: 60, y: 20 }]);
  });

  it('returns nothing for no children', () => {
    expect(layoutExpandedChildren({ x: 0, y: 0 }, [], [{ x: 1, y: 1 }])).toEqual([]);
  });
});
