/**
 * AffinityReader — Per-Vector CPU Affinity Lookup
 *
 * Reads `/proc/irq/<n>/affinity_hint` and `/proc/irq/<n>/smp_affinity_list`
 * at render time. Nothing is cached: affinity can be changed by
 * irqbalance or an operator between two frames.
 *
 * @module
 */
import { join } from 'node:path';
import { encodeCpuMask, parseAffinityHint, NO_CPUS } from './CpuMask.js';
import type { TextSource } from './TextSource.js';

export interface AffinityInfo {
    /** Range list decoded from the driver's hint mask, or `none` */
    readonly hint: string;
    /** Raw `smp_affinity_list` content, or `none` */
    readonly aff: string;
}

/** Looks up affinity for a row name; `undefined` for non-vector rows. */
export type AffinityLookup = (name: string) => AffinityInfo | undefined;

const NUMERIC = /^\d+$/;

/** Whether a row name is a hardware vector number. */
export function isVectorName(name: string): boolean {
    return NUMERIC.test(name);
}

export class AffinityReader {
    constructor(
        private readonly procRoot: string,
        private readonly text: TextSource,
    ) {}

    /** Read both affinity files for a numeric vector. */
    lookup(name: string): AffinityInfo | undefined {
        if (!isVectorName(name)) return undefined;
        const dir = join(this.procRoot, 'irq', name);

        const hintText = this.text.readOptional(join(dir, 'affinity_hint'));
        const mask = hintText === undefined ? undefined : parseAffinityHint(hintText);
        const hint = mask === undefined ? NO_CPUS : encodeCpuMask(mask);

        const affText = this.text.readOptional(join(dir, 'smp_affinity_list'))?.trim();
        const aff = affText === undefined || affText === '' ? NO_CPUS : affText;

        return { hint, aff };
    }

    /** Bound {@link lookup}, for handing to the presenter. */
    readonly asLookup: AffinityLookup = (name) => this.lookup(name);
}
