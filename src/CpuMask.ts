/**
 * CpuMask — CPU Affinity Bitmask ↔ Range List
 *
 * The kernel describes interrupt affinity two ways: as a bitmask
 * (`affinity_hint`, comma-separated 32-bit hex words) and as a range
 * list (`smp_affinity_list`, e.g. `0-3,8`). This module converts a
 * 64-bit mask into the compact range list form and back.
 *
 * @example
 * ```typescript
 * encodeCpuMask(0b1111n);                  // '0-3'
 * encodeCpuMask(0x5800a000fn);             // '0-3,17,19,31-32,34'
 * decodeCpuList('0-3,17,19,31-32,34');     // 0x5800a000fn
 * parseAffinityHint('00000005,800a000f');  // 0x5800a000fn
 * ```
 *
 * @module
 */

/** Number of CPUs a mask can describe. */
export const MASK_BITS = 64;

/** Token rendered for an empty mask. */
export const NO_CPUS = 'none';

// ============================================================================
// Encode
// ============================================================================

/**
 * Range-compress a mask into `lo-hi` / `n` entries, lowest CPU first.
 *
 * The mask is taken modulo 2^64; all 64 bits are scanned.
 * Returns `'none'` when no bit is set.
 */
export function encodeCpuMask(mask: bigint): string {
    const bits = BigInt.asUintN(MASK_BITS, mask);
    if (bits === 0n) return NO_CPUS;

    const entries: string[] = [];
    let runStart = -1;

    // One step past the last bit closes a run that reaches bit 63
    for (let cpu = 0; cpu <= MASK_BITS; cpu++) {
        const set = cpu < MASK_BITS && ((bits >> BigInt(cpu)) & 1n) === 1n;
        if (set) {
            if (runStart < 0) runStart = cpu;
            continue;
        }
        if (runStart >= 0) {
            const runEnd = cpu - 1;
            entries.push(runStart === runEnd ? String(runStart) : `${runStart}-${runEnd}`);
            runStart = -1;
        }
    }

    return entries.join(',');
}

// ============================================================================
// Decode
// ============================================================================

const ENTRY = /^(\d+)(?:-(\d+))?$/;

/**
 * Parse a range list produced by {@link encodeCpuMask} (or the kernel's
 * `smp_affinity_list`) back into a mask.
 *
 * `'none'` and the empty string decode to `0n`.
 *
 * @throws RangeError on a malformed entry, a reversed range, or a CPU ≥ 64
 */
export function decodeCpuList(list: string): bigint {
    const trimmed = list.trim();
    if (trimmed === '' || trimmed === NO_CPUS) return 0n;

    let mask = 0n;
    for (const raw of trimmed.split(',')) {
        const entry = raw.trim();
        const match = ENTRY.exec(entry);
        if (!match) throw new RangeError(`Invalid CPU list entry "${entry}"`);

        const lo = Number(match[1]);
        const hi = match[2] === undefined ? lo : Number(match[2]);
        if (hi < lo) throw new RangeError(`Reversed CPU range "${entry}"`);
        if (hi >= MASK_BITS) throw new RangeError(`CPU ${hi} is outside the ${MASK_BITS}-bit mask`);

        for (let cpu = lo; cpu <= hi; cpu++) mask |= 1n << BigInt(cpu);
    }
    return mask;
}

// ============================================================================
// Kernel Hint Format
// ============================================================================

const HEX_WORD = /^[0-9a-f]+$/i;

/**
 * Read an `affinity_hint` file body.
 *
 * The kernel prints the mask as 32-bit hex words, most significant
 * first (`00000000,0000000f`). The last two words are the high and low
 * halves of the 64-bit mask; a lone word is taken whole.
 *
 * @returns The mask, or `undefined` when the text is empty or not hex
 */
export function parseAffinityHint(text: string): bigint | undefined {
    const words = text.trim().split(',').map(w => w.trim());
    if (words.length === 0 || words.some(w => !HEX_WORD.test(w))) return undefined;

    const low = words[words.length - 1];
    if (low === undefined) return undefined;
    if (words.length === 1) return BigInt.asUintN(MASK_BITS, BigInt(`0x${low}`));

    const high = words[words.length - 2] ?? '0';
    const combined = (BigInt.asUintN(32, BigInt(`0x${high}`)) << 32n)
        | BigInt.asUintN(32, BigInt(`0x${low}`));
    return combined;
}
