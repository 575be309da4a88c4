// chain/src/store.ts
import { Level } from "level";
import type { Block } from "./types.js";
import { validateBlock } from "./validation.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "LEVEL_NOT_FOUND";
}

/**
 * LevelDB persistence for the local chain. Blocks live under `blk:<index>`,
 * the chain length under `head`.
 */
export class ChainStore {
  private db: Level<string, string>;

  constructor(path: string) {
    this.db = new Level<string, string>(path, { valueEncoding: "utf8" });
  }

  private async tryGet(key: string): Promise<string | undefined> {
    try {
      return await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async getHead(): Promise<number> {
    const v = await this.tryGet("head");
    return v === undefined ? 0 : Number(v);
  }

  async getBlock(index: number): Promise<Block | undefined> {
    const v = await this.tryGet(`blk:${index}`);
    if (v === undefined) return undefined;
    const block: unknown = JSON.parse(v);
    validateBlock(block);
    return block;
  }

  /** Reads the stored chain, or `undefined` when nothing was ever committed. */
  async loadChain(): Promise<Block[] | undefined> {
    const head = await this.getHead();
    if (head === 0) return undefined;
    const chain: Block[] = [];
    for (let i = 1; i <= head; i++) {
      const block = await this.getBlock(i);
      if (!block) throw new Error(`Stored chain is missing block #${i} of ${head}`);
      chain.push(block);
    }
    return chain;
  }

  async commitBlock(block: Block) {
    await this.db.batch()
      .put(`blk:${block.index}`, JSON.stringify(block))
      .put("head", String(block.index))
      .write();
  }

  async replaceChain(chain: readonly Block[]) {
    const previousHead = await this.getHead();
    const batch = this.db.batch();
    for (let i = chain.length + 1; i <= previousHead; i++) batch.del(`blk:${i}`);
    for (const block of chain) batch.put(`blk:${block.index}`, JSON.stringify(block));
    batch.put("head", String(chain.length));
    await batch.write();
  }

  async close() {
    await this.db.close();
  }
}
