/**
 * Tests for Item
 */

import { describe, it, expect, vi } from 'vitest';
import { Item } from '../item.js';
import type { ItemStore } from '../item.js';

function createStore(): ItemStore {
  return {
    name: 'users',
    putAttributes: vi.fn(async () => {}),
    deleteAttributes: vi.fn(async () => {}),
  };
}

describe('Item', () => {
  it('should copy its initial attributes', () => {
    const initial = { name: 'Ada' };
    const item = new Item(createStore(), 'user-1', initial);
    item.set('name', 'Grace');

    expect(initial.name).toBe('Ada');
    expect(item.get('name')).toBe('Grace');
  });

  it('should store an attribute named __proto__', () => {
    const item = new Item(createStore(), 'user-1');
    item.set('__proto__', 'x');

    expect(item.has('__proto__')).toBe(true);
    expect(item.get('__proto__')).toBe('x');
    expect(item.keys()).toEqual(['__proto__']);
  });

  it('should expose attribute accessors', () => {
    const item = new Item(createStore(), 'user-1', { name: 'Ada', tags: ['a', 'b'] });

    expect(item.size).toBe(2);
    expect(item.keys()).toEqual(['name', 'tags']);
    expect(item.has('tags')).toBe(true);
    expect(item.has('toString')).toBe(false);
    expect(item.get('missing')).toBeUndefined();
    expect(item.toJSON()).toEqual({ name: 'user-1', attributes: { name: 'Ada', tags: ['a', 'b'] } });
  });

  it('should save every attribute through its store', async () => {
    const store = createStore();
    const item = new Item(store, 'user-1', { name: 'Ada' }).set('age', 36);

    await item.save();

    expect(store.putAttributes).toHaveBeenCalledWith('user-1', { name: 'Ada', age: 36 });
  });

  it('should delete an attribute remotely and locally', async () => {
    const store = createStore();
    const item = new Item(store, 'user-1', { name: 'Ada', tags: ['a', 'b'] });

    await item.deleteAttribute('tags');

    expect(store.deleteAttributes).toHaveBeenCalledWith('user-1', { tags: ['a', 'b'] });
    expect(item.has('tags')).toBe(false);
  });

  it('should ignore deleting an unknown attribute', async () => {
    const store = createStore();

    await new Item(store, 'user-1').deleteAttribute('tags');

    expect(store.deleteAttributes).not.toHaveBeenCalled();
  });
});
