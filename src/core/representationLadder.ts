import { LadderSpec, Representation } from '../types';
import { InvalidInputError } from './errors';

/**
 * Immutable quality ladder sorted ascending by nominal bitrate. Index arithmetic on this
 * ordering drives the one-rung-up / one-rung-down queries.
 */
export class RepresentationLadder {
    private readonly rungs: readonly Representation[];
    private readonly indexById: ReadonlyMap<string, number>;

    private constructor(rungs: Representation[]) {
        this.rungs = rungs;
        this.indexById = new Map(rungs.map((rung, index) => [rung.id, index]));
    }

    public static from(spec: LadderSpec): RepresentationLadder {
        if (spec.length === 0) {
            throw new InvalidInputError('Representation ladder must not be empty');
        }

        const seen = new Set<string>();
        const rungs: Representation[] = spec.map(({ id, nominalBitrateBps }) => {
            if (!id) {
                throw new InvalidInputError('Representation id must not be empty');
            }
            if (seen.has(id)) {
                throw new InvalidInputError(`Duplicate representation id: ${id}`);
            }
            if (!Number.isFinite(nominalBitrateBps) || nominalBitrateBps < 0) {
                throw new InvalidInputError(`Representation ${id} has an invalid bitrate: ${nominalBitrateBps}`);
            }
            seen.add(id);
            return Object.freeze({ id, nominalBitrateBps });
        });

        // Array.prototype.sort is stable, so equal bitrates keep their declared order.
        rungs.sort((a, b) => a.nominalBitrateBps - b.nominalBitrateBps);
        return new RepresentationLadder(rungs);
    }

    public get size(): number {
        return this.rungs.length;
    }

    public lowest(): Representation {
        return this.rungs[0];
    }

    public highest(): Representation {
        return this.rungs[this.rungs.length - 1];
    }

    public indexOf(id: string): number {
        const index = this.indexById.get(id);
        if (index === undefined) {
            throw new InvalidInputError(`Unknown representation id: ${id}`);
        }
        return index;
    }

    public get(id: string): Representation {
        return this.rungs[this.indexOf(id)];
    }

    public has(id: string): boolean {
        return this.indexById.has(id);
    }

    /** Highest rung whose bitrate is strictly below the budget; the later rung wins a tie. */
    public highestAffordable(budgetBps: number): Representation | undefined {
        for (let i = this.rungs.length - 1; i >= 0; i--) {
            if (this.rungs[i].nominalBitrateBps < budgetBps) {
                return this.rungs[i];
            }
        }
        return undefined;
    }

    public stepUp(current: Representation): Representation | undefined {
        return this.rungs[this.indexOf(current.id) + 1];
    }

    public stepDown(current: Representation): Representation | undefined {
        const index = this.indexOf(current.id);
        return index > 0 ? this.rungs[index - 1] : undefined;
    }

    public toArray(): readonly Representation[] {
        return this.rungs;
    }
}
