import type { Weight, Word } from "../types.js";
import type { NodeId, Trie, TrieNode } from "../trie.js";
import { InvalidArgumentError, NullArgumentError } from "../errors.js";
import { checkWeight } from "../term.js";

type Node = {
  character: string;
  parent: NodeId | null;
  children: Map<string, NodeId>;
  terminal: boolean;
  word: Word | undefined;
  weight: Weight;
  subtreeBestWeight: Weight;
};

function makeNode(character: string, parent: NodeId | null, bound: Weight): Node {
  return { character, parent, children: new Map(), terminal: false, word: undefined, weight: 0, subtreeBestWeight: bound };
}

/**
 * Arena-backed trie. Nodes live in one array and refer to each other by index, so
 * the arena is the only owner and parent links stay plain back-references.
 *
 * Keys are UTF-16 code units, matching `String.prototype.startsWith` and the
 * `<` ordering used by the other backends.
 */
export class MemoryTrie implements Trie {
  readonly root: NodeId = 0;
  private readonly nodes: Node[] = [makeNode("", null, 0)];
  private words = 0;

  get size(): number {
    return this.words;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  insert(word: Word, weight: Weight): void {
    if (word == null) throw new NullArgumentError("word");
    if (word.length === 0) throw new InvalidArgumentError("word must be non-empty");
    checkWeight(weight, word);

    // every node on the path gets its bound raised, not only the new ones
    let id = this.root;
    let cur = this.at(id);
    for (let i = 0; i < word.length; i++) {
      if (cur.subtreeBestWeight < weight) cur.subtreeBestWeight = weight;

      const ch = word[i]!;
      let next = cur.children.get(ch);
      if (next === undefined) {
        next = this.nodes.length;
        this.nodes.push(makeNode(ch, id, weight));
        cur.children.set(ch, next);
      }
      id = next;
      cur = this.at(id);
    }

    if (cur.subtreeBestWeight < weight) cur.subtreeBestWeight = weight;
    if (!cur.terminal) this.words++;
    cur.terminal = true;
    cur.word = word;
    // lowering a weight leaves ancestor bounds stale-high; pruning stays sound
    cur.weight = weight;
  }

  node(id: NodeId): TrieNode {
    return this.at(id);
  }

  child(id: NodeId, ch: string): NodeId | undefined {
    return this.at(id).children.get(ch);
  }

  children(id: NodeId): ReadonlyMap<string, NodeId> {
    return this.at(id).children;
  }

  locate(prefix: string): NodeId | undefined {
    let id: NodeId | undefined = this.root;
    for (let i = 0; i < prefix.length; i++) {
      id = this.at(id).children.get(prefix[i]!);
      if (id === undefined) return undefined;
    }
    return id;
  }

  pathOf(id: NodeId): string {
    const chars: string[] = [];
    let cur: NodeId | null = id;
    while (cur !== null) {
      const n = this.at(cur);
      chars.push(n.character);
      cur = n.parent;
    }
    return chars.reverse().join("");
  }

  weightOf(word: Word): Weight {
    if (word == null) throw new NullArgumentError("word");
    const id = this.locate(word);
    if (id === undefined) return 0;
    const n = this.at(id);
    return n.terminal ? n.weight : 0;
  }

  private at(id: NodeId): Node {
    const n = this.nodes[id];
    if (!n) throw new InvalidArgumentError(`unknown trie node ${id}`);
    return n;
  }
}
