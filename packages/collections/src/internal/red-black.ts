/**
 * Red-black tree nodes and the rebalancing that keeps them valid.
 *
 * Ordering is the caller's business: these routines only link, unlink and
 * rotate nodes. Deletion relinks the successor node in place of the removed
 * one rather than copying its key, so every node that stays in the tree
 * keeps its identity.
 */

import { Fault } from "@corral/scope";

export type Color = "red" | "black";

export interface TreeNode<K, V> {
  key: K;
  value: V;
  color: Color;
  left: TreeNode<K, V> | undefined;
  right: TreeNode<K, V> | undefined;
  parent: TreeNode<K, V> | undefined;
}

export function createNode<K, V>(key: K, value: V, parent: TreeNode<K, V> | undefined): TreeNode<K, V> {
  return { key, value, color: "red", left: undefined, right: undefined, parent };
}

function colorOf<K, V>(node: TreeNode<K, V> | undefined): Color {
  return node === undefined ? "black" : node.color;
}

function isRed<K, V>(node: TreeNode<K, V> | undefined): node is TreeNode<K, V> {
  return node !== undefined && node.color === "red";
}

function missing(what: string): Fault {
  return Fault.illegalState(`red-black tree is corrupt: ${what}`);
}

// ============================================================================
// Navigation
// ============================================================================

export function minimum<K, V>(node: TreeNode<K, V>): TreeNode<K, V> {
  let current = node;
  while (current.left !== undefined) current = current.left;
  return current;
}

export function maximum<K, V>(node: TreeNode<K, V>): TreeNode<K, V> {
  let current = node;
  while (current.right !== undefined) current = current.right;
  return current;
}

export function successor<K, V>(node: TreeNode<K, V>): TreeNode<K, V> | undefined {
  if (node.right !== undefined) return minimum(node.right);
  let child = node;
  let parent = node.parent;
  while (parent !== undefined && child === parent.right) {
    child = parent;
    parent = parent.parent;
  }
  return parent;
}

export function predecessor<K, V>(node: TreeNode<K, V>): TreeNode<K, V> | undefined {
  if (node.left !== undefined) return maximum(node.left);
  let child = node;
  let parent = node.parent;
  while (parent !== undefined && child === parent.left) {
    child = parent;
    parent = parent.parent;
  }
  return parent;
}

// ============================================================================
// RedBlackTree
// ============================================================================

export class RedBlackTree<K, V> {
  root: TreeNode<K, V> | undefined = undefined;
  size = 0;

  /**
   * Link a fresh node below `parent` (or as the root) and rebalance.
   */
  attach(key: K, value: V, parent: TreeNode<K, V> | undefined, side: "left" | "right"): TreeNode<K, V> {
    const node = createNode(key, value, parent);
    if (parent === undefined) {
      this.root = node;
    } else if (side === "left") {
      parent.left = node;
    } else {
      parent.right = node;
    }
    this.size++;
    this.insertFixup(node);
    return node;
  }

  /**
   * Unlink `z` and rebalance. `z` is left detached.
   */
  detach(z: TreeNode<K, V>): void {
    const zLeft = z.left;
    const zRight = z.right;
    let removedColor = z.color;
    let x: TreeNode<K, V> | undefined;
    let xParent: TreeNode<K, V> | undefined;

    if (zLeft === undefined) {
      x = zRight;
      xParent = z.parent;
      this.transplant(z, zRight);
    } else if (zRight === undefined) {
      x = zLeft;
      xParent = z.parent;
      this.transplant(z, zLeft);
    } else {
      const y = minimum(zRight);
      removedColor = y.color;
      x = y.right;
      if (y.parent === z) {
        xParent = y;
      } else {
        xParent = y.parent;
        this.transplant(y, y.right);
        y.right = zRight;
        zRight.parent = y;
      }
      this.transplant(z, y);
      y.left = zLeft;
      zLeft.parent = y;
      y.color = z.color;
    }

    z.left = undefined;
    z.right = undefined;
    z.parent = undefined;
    this.size--;

    if (removedColor === "black") this.deleteFixup(x, xParent);
  }

  clear(): void {
    this.root = undefined;
    this.size = 0;
  }

  // --------------------------------------------------------------------------
  // Rebalancing
  // --------------------------------------------------------------------------

  private insertFixup(inserted: TreeNode<K, V>): void {
    let z = inserted;
    for (let parent = z.parent; isRed(parent); parent = z.parent) {
      const grand = parent.parent;
      if (grand === undefined) break;

      if (parent === grand.left) {
        const uncle = grand.right;
        if (isRed(uncle)) {
          parent.color = "black";
          uncle.color = "black";
          grand.color = "red";
          z = grand;
          continue;
        }
        let top = parent;
        if (z === parent.right) {
          this.rotateLeft(parent);
          top = z;
        }
        top.color = "black";
        grand.color = "red";
        this.rotateRight(grand);
        break;
      } else {
        const uncle = grand.left;
        if (isRed(uncle)) {
          parent.color = "black";
          uncle.color = "black";
          grand.color = "red";
          z = grand;
          continue;
        }
        let top = parent;
        if (z === parent.left) {
          this.rotateRight(parent);
          top = z;
        }
        top.color = "black";
        grand.color = "red";
        this.rotateLeft(grand);
        break;
      }
    }
    if (this.root !== undefined) this.root.color = "black";
  }

  private deleteFixup(start: TreeNode<K, V> | undefined, startParent: TreeNode<K, V> | undefined): void {
    let x = start;
    let parent = startParent;

    while (x !== this.root && colorOf(x) === "black") {
      if (parent === undefined) break;

      if (x === parent.left) {
        let w = parent.right;
        if (w === undefined) throw missing("black node without a sibling");
        if (w.color === "red") {
          w.color = "black";
          parent.color = "red";
          this.rotateLeft(parent);
          w = parent.right;
          if (w === undefined) throw missing("black node without a sibling");
        }
        if (colorOf(w.left) === "black" && colorOf(w.right) === "black") {
          w.color = "red";
          x = parent;
          parent = x.parent;
        } else {
          if (colorOf(w.right) === "black") {
            if (w.left !== undefined) w.left.color = "black";
            w.color = "red";
            this.rotateRight(w);
            w = parent.right;
            if (w === undefined) throw missing("black node without a sibling");
          }
          w.color = parent.color;
          parent.color = "black";
          if (w.right !== undefined) w.right.color = "black";
          this.rotateLeft(parent);
          x = this.root;
          parent = undefined;
        }
      } else {
        let w = parent.left;
        if (w === undefined) throw missing("black node without a sibling");
        if (w.color === "red") {
          w.color = "black";
          parent.color = "red";
          this.rotateRight(parent);
          w = parent.left;
          if (w === undefined) throw missing("black node without a sibling");
        }
        if (colorOf(w.right) === "black" && colorOf(w.left) === "black") {
          w.color = "red";
          x = parent;
          parent = x.parent;
        } else {
          if (colorOf(w.left) === "black") {
            if (w.right !== undefined) w.right.color = "black";
            w.color = "red";
            this.rotateLeft(w);
            w = parent.left;
            if (w === undefined) throw missing("black node without a sibling");
          }
          w.color = parent.color;
          parent.color = "black";
          if (w.left !== undefined) w.left.color = "black";
          this.rotateRight(parent);
          x = this.root;
          parent = undefined;
        }
      }
    }

    if (x !== undefined) x.color = "black";
  }

  private rotateLeft(x: TreeNode<K, V>): void {
    const y = x.right;
    if (y === undefined) throw missing("left rotation without a right child");
    x.right = y.left;
    if (y.left !== undefined) y.left.parent = x;
    this.replaceChild(x, y);
    y.left = x;
    x.parent = y;
  }

  private rotateRight(x: TreeNode<K, V>): void {
    const y = x.left;
    if (y === undefined) throw missing("right rotation without a left child");
    x.left = y.right;
    if (y.right !== undefined) y.right.parent = x;
    this.replaceChild(x, y);
    y.right = x;
    x.parent = y;
  }

  /** Put `v` where `u` hangs from its parent. */
  private replaceChild(u: TreeNode<K, V>, v: TreeNode<K, V>): void {
    const parent = u.parent;
    v.parent = parent;
    if (parent === undefined) {
      this.root = v;
    } else if (u === parent.left) {
      parent.left = v;
    } else {
      parent.right = v;
    }
  }

  private transplant(u: TreeNode<K, V>, v: TreeNode<K, V> | undefined): void {
    const parent = u.parent;
    if (parent === undefined) {
      this.root = v;
    } else if (u === parent.left) {
      parent.left = v;
    } else {
      parent.right = v;
    }
    if (v !== undefined) v.parent = parent;
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check the red-black and ordering invariants of `tree`. Returns the black
 * height; throws IllegalState naming the first violation.
 */
export function validateRedBlack<K, V>(
  tree: RedBlackTree<K, V>,
  compare: (a: K, b: K) => number
): number {
  const root = tree.root;
  if (root !== undefined && root.color !== "black") throw missing("red root");
  if (root !== undefined && root.parent !== undefined) throw missing("root has a parent");

  let count = 0;
  const visit = (node: TreeNode<K, V> | undefined, low: TreeNode<K, V> | undefined, high: TreeNode<K, V> | undefined): number => {
    if (node === undefined) return 1;
    count++;
    if (low !== undefined && compare(low.key, node.key) >= 0) throw missing("keys out of order");
    if (high !== undefined && compare(node.key, high.key) >= 0) throw missing("keys out of order");
    if (node.left !== undefined && node.left.parent !== node) throw missing("broken parent link");
    if (node.right !== undefined && node.right.parent !== node) throw missing("broken parent link");
    if (node.color === "red" && (isRed(node.left) || isRed(node.right))) throw missing("red node with a red child");
    const leftHeight = visit(node.left, low, node);
    const rightHeight = visit(node.right, node, high);
    if (leftHeight !== rightHeight) throw missing("unequal black heights");
    return leftHeight + (node.color === "black" ? 1 : 0);
  };

  const height = visit(root, undefined, undefined);
  if (count !== tree.size) throw missing(`size is ${tree.size} but ${count} nodes are linked`);
  return height;
}
