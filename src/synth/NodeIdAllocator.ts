import { FIRST_NODE_ID, MAX_NODE_ID } from "../constants";

/**
 * Hands out server node ids for new voices.
 *
 * Ids increase monotonically from `first` and wrap back to `first` after
 * `max`, so two live voices never share an id.  `reset()` is called on
 * every boot: ids are scoped to one server connection.
 */
export class NodeIdAllocator {
    private nextId: number;

    constructor(
        private readonly first = FIRST_NODE_ID,
        private readonly max = MAX_NODE_ID,
    ) {
        if (!Number.isInteger(first) || !Number.isInteger(max) || first > max) {
            throw new RangeError(`Invalid node id range ${first}..${max}`);
        }
        this.nextId = first;
    }

    next(): number {
        const id = this.nextId;
        this.nextId = id >= this.max ? this.first : id + 1;
        return id;
    }

    reset() {
        this.nextId = this.first;
    }
}
