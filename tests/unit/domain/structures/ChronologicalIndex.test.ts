import { describe, it, expect } from 'vitest';
import { ChronologicalIndex } from '../../../../src/domain/structures/ChronologicalIndex.js';

type Entry = { id: string; tag: string };

const entry = (id: string, tag = 'x'): Entry => ({ id, tag });
const ids = (entries: Entry[]) => entries.map((e) => e.id);

describe('ChronologicalIndex', () => {
  it('should keep front insertions newest first', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a'));
    index.addFront(entry('b'));
    index.addFront(entry('c'));

    expect(ids(index.traverseForward())).toEqual(['c', 'b', 'a']);
    expect(ids(index.traverseBackward())).toEqual(['a', 'b', 'c']);
    expect(index.size).toBe(3);
  });

  it('should append back insertions after existing entries', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a'));
    index.addBack(entry('z'));
    index.addFront(entry('b'));

    expect(ids(index.traverseForward())).toEqual(['b', 'a', 'z']);
  });

  it('should unlink head, middle and tail entries', () => {
    const index = new ChronologicalIndex<Entry>();
    ['a', 'b', 'c', 'd'].forEach((id) => index.addBack(entry(id)));

    expect(index.deleteById('b')).toBe(true);
    expect(ids(index.traverseForward())).toEqual(['a', 'c', 'd']);

    expect(index.deleteById('a')).toBe(true);
    expect(index.deleteById('d')).toBe(true);
    expect(ids(index.traverseForward())).toEqual(['c']);
    expect(ids(index.traverseBackward())).toEqual(['c']);

    index.addFront(entry('e'));
    index.addBack(entry('f'));
    expect(ids(index.traverseForward())).toEqual(['e', 'c', 'f']);
  });

  it('should return false when deleting an unknown id', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a'));

    expect(index.deleteById('missing')).toBe(false);
    expect(index.size).toBe(1);
  });

  it('should produce snapshots unaffected by later mutation', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a'));
    const snapshot = index.traverseForward();

    index.addFront(entry('b'));
    index.deleteById('a');

    expect(ids(snapshot)).toEqual(['a']);
  });

  it('should filter and take from the front', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a', 'food'));
    index.addFront(entry('b', 'rent'));
    index.addFront(entry('c', 'food'));

    expect(ids(index.filter((e) => e.tag === 'food'))).toEqual(['c', 'a']);
    expect(ids(index.takeFront(2))).toEqual(['c', 'b']);
    expect(index.findById('b')).toEqual(entry('b', 'rent'));
    expect(index.has('z')).toBe(false);
  });

  it('should empty completely on clear', () => {
    const index = new ChronologicalIndex<Entry>();
    index.addFront(entry('a'));
    index.clear();

    expect(index.traverseForward()).toEqual([]);
    expect(index.size).toBe(0);
  });
});
