import { z } from 'zod';
import rawStates from '../../data/us_states.json';
import { InvalidTargetError } from '../../utils/errors';

const StateSchema = z.object({
    slug: z.string().min(1),
    name: z.string().min(1),
    abbreviation: z.string().length(2),
});

export type UsState = z.infer<typeof StateSchema>;

export const US_STATES: UsState[] = z.array(StateSchema).parse(rawStates);

/** Targets that expand to every state in the catalog. */
export const ALL_STATES_SENTINELS = ['all', 'us'];

/**
 * Resolves a CLI target to state slugs. Accepts a slug, a state name or a
 * two-letter abbreviation, case-insensitively.
 */
export function resolveTargets(target: string): string[] {
    const wanted = target.trim().toLowerCase();
    if (ALL_STATES_SENTINELS.includes(wanted)) {
        return US_STATES.map((s) => s.slug);
    }

    const match = US_STATES.find((s) =>
        s.slug === wanted ||
        s.name.toLowerCase() === wanted ||
        s.abbreviation.toLowerCase() === wanted ||
        s.slug === wanted.replace(/\s+/g, '-')
    );
    if (!match) {
        throw new InvalidTargetError(target);
    }
    return [match.slug];
}
