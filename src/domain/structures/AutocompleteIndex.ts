import { Arena, type Handle } from './Arena.js';

export const DEFAULT_SUGGESTION_LIMIT = 10;

type TrieNode = {
  children: Map<string, Handle>;
  word: string | null; // original casing, set on terminal nodes
};

/**
 * AutocompleteIndex - case-insensitive prefix tree
 * Suggestion order follows child traversal and is not sorted.
 */
export class AutocompleteIndex {
  private nodes = new Arena<TrieNode>();
  private root: Handle = this.nodes.allocate(emptyNode());
  private wordCount = 0;

  // O(length)
  insert(word: string): void {
    if (word === '') return;

    let current = this.nodes.require(this.root);
    for (const char of word.toLowerCase()) {
      let child = current.children.get(char);
      if (!child) {
        child = this.nodes.allocate(emptyNode());
        current.children.set(char, child);
      }
      current = this.nodes.require(child);
    }

    // First casing wins; "FOOD" after "Food" is the same entry
    if (current.word === null) {
      current.word = word;
      this.wordCount++;
    }
  }

  search(word: string): boolean {
    const node = this.descend(word);
    return node !== undefined && node.word !== null;
  }

  startsWith(prefix: string): boolean {
    return this.descend(prefix) !== undefined;
  }

  getWordsWithPrefix(prefix: string, limit: number = DEFAULT_SUGGESTION_LIMIT): string[] {
    const start = this.descend(prefix);
    if (!start) return [];

    const result: string[] = [];
    this.collect(start, result, limit);
    return result;
  }

  getAllWords(): string[] {
    const result: string[] = [];
    this.collect(this.nodes.require(this.root), result, Number.POSITIVE_INFINITY);
    return result;
  }

  remove(word: string): boolean {
    const node = this.descend(word);
    if (!node || node.word === null) return false;
    node.word = null;
    this.wordCount--;
    return true;
  }

  get size(): number {
    return this.wordCount;
  }

  clear(): void {
    this.nodes.clear();
    this.root = this.nodes.allocate(emptyNode());
    this.wordCount = 0;
  }

  private descend(prefix: string): TrieNode | undefined {
    let current = this.nodes.require(this.root);
    for (const char of prefix.toLowerCase()) {
      const child = current.children.get(char);
      if (!child) return undefined;
      current = this.nodes.require(child);
    }
    return current;
  }

  private collect(node: TrieNode, result: string[], limit: number): void {
    if (result.length >= limit) return;
    if (node.word !== null) {
      result.push(node.word);
    }
    for (const child of node.children.values()) {
      if (result.length >= limit) return;
      this.collect(this.nodes.require(child), result, limit);
    }
  }
}

function emptyNode(): TrieNode {
  return { children: new Map(), word: null };
}
