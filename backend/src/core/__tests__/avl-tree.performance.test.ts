import { describe, it, expect, beforeEach } from 'vitest';
import { faker } from '@faker-js/faker';
import { AvlTree } from '../avl-tree.js';
import { BoundedAllocator } from '../allocator.js';

const numeric = (a: number, b: number): number => a - b;

// Worst-case AVL height for n nodes
const heightBound = (n: number): number => Math.floor(1.4405 * Math.log2(n + 2));

describe('Performance Tests', () => {
  describe('AVL Tree Performance', () => {
    let tree: AvlTree<number>;

    beforeEach(() => {
      tree = new AvlTree<number>({ compare: numeric });
    });

    it('should handle 100K ascending insertions in under 5 seconds', () => {
      const numInsertions = 100000;
      const startTime = Date.now();

      for (let i = 0; i < numInsertions; i++) {
        tree.insert(i);
      }

      const duration = Date.now() - startTime;
      console.log(`${numInsertions} ascending insertions took ${duration}ms, height ${tree.getHeight()}`);

      expect(duration).toBeLessThan(5000);
      expect(tree.getSize()).toBe(numInsertions);
      expect(tree.getHeight()).toBeLessThanOrEqual(heightBound(numInsertions));
    });

    it('should tear down 100K nodes without recursion', () => {
      const numItems = 100000;
      const allocator = new BoundedAllocator(numItems);
      let destroyed = 0;
      const owned = new AvlTree<number>({ compare: numeric, allocator, destroy: () => { destroyed++; } });

      for (let i = numItems; i > 0; i--) {
        owned.insert(i);
      }

      const startTime = Date.now();
      const released = owned.deinit();
      const duration = Date.now() - startTime;
      console.log(`Teardown of ${numItems} nodes took ${duration}ms`);

      expect(released).toBe(numItems);
      expect(destroyed).toBe(numItems);
      expect(allocator.getStats().inUse).toBe(0);
      expect(duration).toBeLessThan(1000);
    });

    it('should handle 50K lookups in under 1 second', () => {
      const numItems = 10000;
      const keys: number[] = [];

      for (let i = 0; i < numItems; i++) {
        const key = i * 2;
        tree.insert(key);
        keys.push(key);
      }

      const numLookups = 50000;
      const startTime = Date.now();
      let hits = 0;

      for (let i = 0; i < numLookups; i++) {
        const key = faker.helpers.arrayElement(keys);
        if (tree.has(key)) hits++;
      }

      const duration = Date.now() - startTime;
      console.log(`${numLookups} lookups took ${duration}ms`);

      expect(hits).toBe(numLookups);
      expect(duration).toBeLessThan(1000);
    });

    it('should handle mixed operations under load', () => {
      const operations = 50000;
      const startTime = Date.now();
      let insertCount = 0;
      let deleteCount = 0;
      let findCount = 0;

      for (let i = 0; i < operations; i++) {
        const operation = Math.random();
        const key = Math.floor(Math.random() * 10000);

        if (operation < 0.5) {
          tree.insert(key);
          insertCount++;
        } else if (operation < 0.7) {
          tree.remove(key);
          deleteCount++;
        } else {
          tree.find(key);
          findCount++;
        }
      }

      const duration = Date.now() - startTime;
      console.log(`Mixed operations (${insertCount} inserts, ${deleteCount} deletes, ${findCount} finds) took ${duration}ms`);

      expect(duration).toBeLessThan(3000);
      expect(tree.verify()).toEqual([]);
      expect(tree.getHeight()).toBeLessThanOrEqual(heightBound(tree.getSize()));
    });

    it('should clone 50K nodes in under 1 second', () => {
      for (let i = 0; i < 50000; i++) {
        tree.insert(i);
      }

      const startTime = Date.now();
      const copy = tree.clone();
      const duration = Date.now() - startTime;
      console.log(`Clone of 50000 nodes took ${duration}ms`);

      expect(copy?.getSize()).toBe(50000);
      expect(copy?.getHeight()).toBe(tree.getHeight());
      expect(duration).toBeLessThan(1000);
    });
  });
});
