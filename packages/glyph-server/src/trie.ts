class TrieNode {
  readonly children = new Map<string, TrieNode>();
  readonly ids = new Set<number>();
}

/**
 * Character prefix tree over normalized names. Every node keeps the ids of
 * all keys passing through it, so a prefix lookup is one walk down the tree.
 */
export class PrefixTrie {
  private root = new TrieNode();

  insert(key: string, id: number) {
    if (!key) return;
    let node = this.root;
    for (const ch of key) {
      let next = node.children.get(ch);
      if (!next) {
        next = new TrieNode();
        node.children.set(ch, next);
      }
      next.ids.add(id);
      node = next;
    }
  }

  lookup(prefix: string): Set<number> {
    if (!prefix) return new Set();
    let node: TrieNode | undefined = this.root;
    for (const ch of prefix) {
      node = node.children.get(ch);
      if (!node) return new Set();
    }
    return new Set(node.ids);
  }
}
