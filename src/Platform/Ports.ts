import type { BlockHeight } from '../ledger-core/L0/Primitives.js';
import type { IEventStore } from '../ledger-core/L5/Audit.js';

export type { IEventStore };

/**
 * Environment Port: Block Clock
 * Supplies the height stamped on every call.
 */
export interface IBlockClock {
    current(): BlockHeight;
    advance(blocks: number): BlockHeight;
}

/**
 * Single-sequencer clock: the service seals one block per committed call and
 * can be moved forward explicitly.
 */
export class SequencedBlockClock implements IBlockClock {
    constructor(private height: BlockHeight = 1) { }

    public current(): BlockHeight { return this.height; }

    public advance(blocks: number): BlockHeight {
        if (!Number.isSafeInteger(blocks) || blocks < 0) throw new Error(`Clock Error: cannot advance by ${blocks}`);
        this.height += blocks;
        return this.height;
    }
}
