export const OPEN_OBJECT = 0x7b; // {
export const OPEN_ARRAY = 0x5b;  // [

export type Container = typeof OPEN_OBJECT | typeof OPEN_ARRAY;

/**
 * Bounded stack of open containers, one opening byte per level.
 * Its size is the current nesting depth.
 */
export class NestingStack {
    private readonly markers: Uint8Array;
    private size = 0;

    constructor(maxDepth: number) {
        this.markers = new Uint8Array(maxDepth);
    }

    get depth(): number {
        return this.size;
    }

    get full(): boolean {
        return this.size >= this.markers.length;
    }

    /**
     * Opening byte of the innermost container, or 0 at top level.
     */
    top(): number {
        return this.size > 0 ? this.markers[this.size - 1] : 0;
    }

    push(marker: Container): void {
        if (this.full) throw new RangeError('nesting stack is full');
        this.markers[this.size++] = marker;
    }

    /**
     * Pop the innermost container if `closer` closes it.
     * Returns false, leaving the stack untouched, on a mismatch.
     */
    close(closer: number): boolean {
        // In ASCII, ] and } sit two positions after [ and {
        if (this.size === 0 || closer !== this.markers[this.size - 1] + 2) return false;
        this.size--;
        return true;
    }
}
