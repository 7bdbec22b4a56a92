import { expandNames, dedupe } from '../src/resolver.js';
import { CycleError } from '../src/errors/index.js';
import { createEmptyIndex, type ResourceIndex } from '../src/types/index.js';

function indexWithGroups(groups: Record<string, string[]>, resources: string[] = []): ResourceIndex {
  const index = createEmptyIndex();
  for (const [name, members] of Object.entries(groups)) {
    index.groups.set(name, members);
  }
  for (const name of resources) {
    index.resources.set(name, { name, url: `https://example.test/${name}`, destinationDir: 'out', extract: false });
  }
  return index;
}

describe('dedupe', () => {
  it('should keep the first occurrence of each name', () => {
    expect(dedupe(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('expandNames', () => {
  it('should return plain names unchanged, without checking they exist', () => {
    const index = indexWithGroups({});
    expect(expandNames(index, ['a', 'unknown'])).toEqual(['a', 'unknown']);
  });

  it('should expand depth-first and drop repeated leaves', () => {
    const index = indexWithGroups({ g: ['a', 'h'], h: ['b', 'a'] });
    expect(expandNames(index, ['g'])).toEqual(['a', 'b']);
  });

  it('should deduplicate requested names before expanding', () => {
    const index = indexWithGroups({ g: ['a', 'b'] });
    const seen: string[] = [];

    const result = expandNames(index, ['g', 'g', 'c'], {
      onGroupExpanded: (group) => seen.push(group),
    });

    expect(result).toEqual(['a', 'b', 'c']);
    expect(seen).toEqual(['g']);
  });

  it('should keep first-seen order across several requested names', () => {
    const index = indexWithGroups({ first: ['c', 'a'], second: ['b', 'c'] });
    expect(expandNames(index, ['second', 'first'])).toEqual(['b', 'c', 'a']);
  });

  it('should throw a cycle error for mutually recursive groups', () => {
    const index = indexWithGroups({ x: ['y'], y: ['x'] });

    expect(() => expandNames(index, ['x'])).toThrow(CycleError);
    expect(() => expandNames(index, ['x'])).toThrow("cyclic group reference detected at 'x'");
  });

  it('should report where the cycle closed and the path that led there', () => {
    const index = indexWithGroups({ x: ['y'], y: ['z', 'x'], z: [] });

    let caught: unknown;
    try {
      expandNames(index, ['x']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CycleError);
    expect(caught).toMatchObject({ at: 'x', details: { at: 'x', path: ['x', 'y'] } });
  });

  it('should detect a group that contains itself', () => {
    const index = indexWithGroups({ self: ['a', 'self'] });
    expect(() => expandNames(index, ['self'])).toThrow("cyclic group reference detected at 'self'");
  });

  it('should allow a group reached twice along different paths', () => {
    const index = indexWithGroups({ g: ['h', 'k'], h: ['a'], k: ['h', 'b'] });
    expect(expandNames(index, ['g'])).toEqual(['a', 'b']);
  });

  it('should treat a name that is both group and resource as a group', () => {
    const index = indexWithGroups({ both: ['a'] }, ['both', 'a']);
    expect(expandNames(index, ['both'])).toEqual(['a']);
  });

  it('should trace each group expansion with its direct members', () => {
    const index = indexWithGroups({ g: ['a', 'h'], h: ['b'] });
    const trace: string[] = [];

    expandNames(index, ['g'], {
      onGroupExpanded: (group, members) => trace.push(`${group}: ${members.join(' ')}`),
    });

    expect(trace).toEqual(['g: a h', 'h: b']);
  });
});
