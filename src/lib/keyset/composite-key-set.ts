/**
 * CompositeKeySet stores string tuples in a prefix tree.
 * Each level is keyed by the literal value at that tuple position, so values
 * containing any separator character can never collide.
 */

interface TrieNode {
  children: Map<string, TrieNode>;
  // Set on the node that ends an inserted tuple
  terminal: boolean;
}

function createNode(): TrieNode {
  return { children: new Map(), terminal: false };
}

export class CompositeKeySet {
  private readonly root: TrieNode = createNode();
  private count = 0;

  /**
   * Whether `tuple` was inserted before. The empty tuple is never present.
   */
  exists(tuple: readonly string[]): boolean {
    if (tuple.length === 0) {
      return false;
    }

    let node: TrieNode | undefined = this.root;
    for (const value of tuple) {
      node = node.children.get(value);
      if (!node) {
        return false;
      }
    }
    return node.terminal;
  }

  /**
   * Insert `tuple`, creating missing intermediate nodes. Re-inserting is a no-op.
   */
  insert(tuple: readonly string[]): void {
    if (tuple.length === 0) {
      return;
    }

    let node = this.root;
    for (const value of tuple) {
      let child = node.children.get(value);
      if (!child) {
        child = createNode();
        node.children.set(value, child);
      }
      node = child;
    }
    if (!node.terminal) {
      node.terminal = true;
      this.count++;
    }
  }

  /**
   * Number of distinct tuples inserted
   */
  size(): number {
    return this.count;
  }
}
