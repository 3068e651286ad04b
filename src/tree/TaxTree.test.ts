/**
 * TaxTree.test.ts - Growth, shaping and pruning of single-sample trees
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { isScored } from '../core/types';
import { InMemoryTaxonomy } from '../taxonomy/InMemoryTaxonomy';
import {
  bacteriaTaxonomy,
  bacteriaCounts,
  bacteriaScores,
  chainTaxonomy,
  captureLogger,
} from '../testing/fixtures';
import { TaxTree } from './TaxTree';
import type { TaxonNode } from './types';

function find(node: TaxonNode, taxid: string): TaxonNode | undefined {
  if (node.taxid === taxid) return node;
  for (const child of node.children.values()) {
    const found = find(child, taxid);
    if (found) return found;
  }
  return undefined;
}

function nodeOf(tree: TaxTree, taxid: string): TaxonNode {
  const node = find(tree.root, taxid);
  assert.ok(node, 'missing node ' + taxid);
  return node;
}

function shapedBacteria(): TaxTree {
  const tree = TaxTree.grow(bacteriaTaxonomy(), bacteriaCounts(), bacteriaScores());
  tree.shape();
  return tree;
}

// ============================================================================
// Growth
// ============================================================================

describe('TaxTree.grow', () => {
  test('mirrors the taxonomy below the root', () => {
    const tree = TaxTree.grow(bacteriaTaxonomy(), bacteriaCounts(), bacteriaScores());

    assert.strictEqual(tree.root.taxid, '1');
    assert.strictEqual(tree.size(), 10);
    assert.deepStrictEqual([...tree.root.children.keys()], ['2', '10239']);
    assert.strictEqual(nodeOf(tree, '562').counts, 10);
    assert.strictEqual(nodeOf(tree, '562').score, 90);
    assert.strictEqual(nodeOf(tree, '561').counts, 0);
    assert.strictEqual(isScored(nodeOf(tree, '561').score), false);
    assert.strictEqual(nodeOf(tree, '1386').rank, 'genus');
  });

  test('accumulated counts stay at zero until shaped', () => {
    const tree = TaxTree.grow(bacteriaTaxonomy(), bacteriaCounts());
    assert.strictEqual(tree.root.acc, 0);
    assert.strictEqual(nodeOf(tree, '562').acc, 0);
  });

  test('missing abundances give a single read at the root', () => {
    const tree = TaxTree.grow(bacteriaTaxonomy());
    assert.strictEqual(tree.root.counts, 1);
    assert.strictEqual(tree.totalCounts(), 1);

    tree.shape();
    assert.strictEqual(tree.size(), 1);
    assert.strictEqual(tree.root.acc, 1);
  });

  test('empty abundances are treated as missing', () => {
    const tree = TaxTree.grow(bacteriaTaxonomy(), new Map());
    assert.strictEqual(tree.root.counts, 1);
  });

  test('self-references and back-edges end their branch', () => {
    // 1 → 2 → 3, with 3 pointing back at 2 and at itself
    const taxonomy = new InMemoryTaxonomy([
      { taxid: '1', parent: '1' },
      { taxid: '2', parent: '1' },
      { taxid: '3', parent: '2' },
      { taxid: '2', parent: '3' },
      { taxid: '3', parent: '3' },
    ]);
    const tree = TaxTree.grow(taxonomy, new Map([['3', 4]]));

    assert.strictEqual(tree.size(), 3);
    assert.strictEqual(tree.render(0), '1[0]->(2[0]->(3[4],))');
  });
});

// ============================================================================
// Shape
// ============================================================================

describe('TaxTree.shape', () => {
  test('accumulates counts bottom-up', () => {
    const tree = shapedBacteria();

    assert.strictEqual(nodeOf(tree, '561').acc, 15);
    assert.strictEqual(nodeOf(tree, '1224').acc, 15);
    assert.strictEqual(nodeOf(tree, '1239').acc, 3);
    assert.strictEqual(nodeOf(tree, '2').acc, 19);
    assert.strictEqual(tree.root.acc, 19);
  });

  test('root accumulation equals the sum of direct counts', () => {
    const tree = shapedBacteria();
    assert.strictEqual(tree.root.acc, tree.totalCounts());
  });

  test('removes branches without reads', () => {
    const tree = shapedBacteria();
    assert.deepStrictEqual([...tree.root.children.keys()], ['2']);
    assert.strictEqual(tree.size(), 9);
  });

  test('scores nodes without direct counts from their children', () => {
    const tree = shapedBacteria();

    // (90 * 10 + 60 * 5) / 15
    assert.strictEqual(nodeOf(tree, '561').score, 80);
    assert.strictEqual(nodeOf(tree, '1224').score, 80);
    assert.strictEqual(nodeOf(tree, '1386').score, 20);
    // Only child is 2, which keeps its own score
    assert.strictEqual(tree.root.score, 40);
  });

  test('nodes with direct counts keep their own score', () => {
    const tree = shapedBacteria();
    assert.strictEqual(nodeOf(tree, '2').score, 40);
  });

  test('a tree without any placed read keeps NO_SCORE at the root', () => {
    const tree = TaxTree.grow(bacteriaTaxonomy(), new Map([['999', 5]]));
    tree.shape();

    assert.strictEqual(tree.root.acc, 0);
    assert.strictEqual(tree.size(), 1);
    assert.strictEqual(isScored(tree.root.score), false);
  });

  test('shaping twice changes nothing', () => {
    const tree = shapedBacteria();
    const before = { render: tree.render(0), accs: new Map<string, number>(), scores: new Map<string, number>() };
    tree.getTaxa({ accs: before.accs, scores: before.scores });

    tree.shape();
    const accs = new Map<string, number>();
    const scores = new Map<string, number>();
    tree.getTaxa({ accs, scores });

    assert.strictEqual(tree.render(0), before.render);
    assert.deepStrictEqual(accs, before.accs);
    assert.deepStrictEqual(scores, before.scores);
  });
});

// ============================================================================
// Prune
// ============================================================================

describe('TaxTree.prune', () => {
  test('minTaxa=1 keeps every populated leaf', () => {
    const tree = shapedBacteria();
    const hasChildren = tree.prune({ minTaxa: 1 });

    assert.strictEqual(hasChildren, true);
    assert.strictEqual(tree.size(), 9);
    assert.strictEqual(tree.totalCounts(), 19);
  });

  test('collapsing moves counts up and keeps the total', () => {
    const tree = shapedBacteria();
    tree.prune({ minTaxa: 6, collapse: true });

    assert.strictEqual(tree.totalCounts(), 19);
    assert.strictEqual(tree.render(0), '1[0]->(2[4]->(1224[0]->(561[5]->(562[10],))))');
    assert.strictEqual(nodeOf(tree, '561').score, 60);
    // (40 * 1 + 20 * 3) / 4
    assert.strictEqual(nodeOf(tree, '2').score, 25);
    assert.strictEqual(nodeOf(tree, '2').acc, 19);
    assert.strictEqual(tree.root.acc, 19);
  });

  test('without collapse pruned counts leave the parent acc', () => {
    const tree = shapedBacteria();
    tree.prune({ minTaxa: 6, collapse: false });

    assert.strictEqual(tree.size(), 5);
    assert.strictEqual(tree.totalCounts(), 11);
    assert.strictEqual(nodeOf(tree, '561').acc, 10);
    assert.strictEqual(nodeOf(tree, '561').counts, 0);
  });

  test('minRank folds finer leaves into their parent', () => {
    const tree = shapedBacteria();
    tree.prune({ minRank: 'genus' });

    assert.strictEqual(tree.size(), 6);
    assert.strictEqual(tree.totalCounts(), 19);
    assert.strictEqual(nodeOf(tree, '561').counts, 15);
    assert.strictEqual(nodeOf(tree, '561').score, 80);
    assert.strictEqual(nodeOf(tree, '1386').counts, 3);
    assert.strictEqual(find(tree.root, '562'), undefined);
  });

  test('minRank prunes a leaf whose parent is already at the floor', () => {
    // 20 and its child 30 are both species
    const taxonomy = new InMemoryTaxonomy([
      { taxid: '1', parent: '1' },
      { taxid: '10', parent: '1', rank: 'genus' },
      { taxid: '20', parent: '10', rank: 'species' },
      { taxid: '30', parent: '20', rank: 'species' },
    ]);
    const tree = TaxTree.grow(taxonomy, new Map([['30', 4]]));
    tree.shape();
    tree.prune({ minRank: 'species' });

    assert.strictEqual(tree.render(), '->(->(20[4],))');
    assert.strictEqual(nodeOf(tree, '20').acc, 4);
  });

  test('without collapse acc does not drop below zero', () => {
    // Unshaped, so every acc is still 0
    const tree = TaxTree.grow(bacteriaTaxonomy(), bacteriaCounts());
    tree.prune({ minTaxa: 6, collapse: false });

    assert.strictEqual(nodeOf(tree, '561').acc, 0);
    assert.strictEqual(find(tree.root, '564'), undefined);
    assert.strictEqual(nodeOf(tree, '562').counts, 10);
    assert.strictEqual(tree.root.acc, 0);
  });

  test('returns false once the root has no children left', () => {
    const tree = TaxTree.grow(chainTaxonomy(), new Map([['300', 3]]));
    tree.shape();

    assert.strictEqual(tree.prune({ minTaxa: 5 }), false);
    assert.strictEqual(tree.size(), 1);
    assert.strictEqual(tree.root.counts, 3);
  });

  test('debug logs every pruned leaf', () => {
    const tree = TaxTree.grow(chainTaxonomy(), new Map([['200', 3]]));
    tree.shape();
    const { lines, log } = captureLogger();

    tree.prune({ minTaxa: 5, debug: true, logger: log });

    assert.deepStrictEqual(lines, ['Pruning leaf 200, counts=3', 'Pruning leaf 100, counts=3']);
  });
});
