import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Cmra, DeliveryClassification, Rdi } from '../../types';
import { CredentialsRejectedError, toHttpError } from '../../utils/errors';
import { SmartyCredentials } from './credentials';

export interface VerificationQuery {
    street: string;
    city: string;
    state: string;
    zipcode: string;
    secondary?: string; // Present only for unit-level verification
}

export type VerificationResult = DeliveryClassification & {
    matched: boolean; // false for no match, ambiguous or unreadable responses
};

/** Seam between the Verifier and the validation API; tests pass a stub. */
export interface AddressValidationClient {
    verify(query: VerificationQuery): Promise<VerificationResult>;
}

const SmartyCandidateSchema = z.object({
    delivery_line_1: z.string().optional(),
    metadata: z.object({ rdi: z.string().optional() }).passthrough().optional(),
    analysis: z.object({
        dpv_match_code: z.string().optional(),
        dpv_cmra: z.string().optional(),
    }).passthrough().optional(),
}).passthrough();

const SmartyResponseSchema = z.array(SmartyCandidateSchema);

export type SmartyCandidate = z.infer<typeof SmartyCandidateSchema>;

export const UNKNOWN_RESULT: VerificationResult = { rdi: Rdi.UNKNOWN, cmra: Cmra.UNKNOWN, matched: false };

const REJECTED_CREDENTIAL_STATUSES = [401, 402, 403];

function toRdi(value: string | undefined): Rdi {
    switch (value?.toLowerCase()) {
        case 'residential': return Rdi.RESIDENTIAL;
        case 'commercial': return Rdi.COMMERCIAL;
        default: return Rdi.UNKNOWN;
    }
}

function toCmra(value: string | undefined): Cmra {
    switch (value?.toUpperCase()) {
        case 'Y': return Cmra.YES;
        case 'N': return Cmra.NO;
        default: return Cmra.UNKNOWN;
    }
}

/**
 * Exactly one candidate is a match. Zero or several are never guessed at.
 */
export function classifyCandidates(candidates: SmartyCandidate[]): VerificationResult {
    if (candidates.length !== 1) return UNKNOWN_RESULT;
    const [candidate] = candidates;
    return {
        rdi: toRdi(candidate.metadata?.rdi),
        cmra: toCmra(candidate.analysis?.dpv_cmra),
        matched: true,
    };
}

export interface SmartyClientOptions {
    apiUrl: string;
    timeoutMs: number;
}

export class SmartyClient implements AddressValidationClient {
    private client: AxiosInstance;

    constructor(private credentials: SmartyCredentials, private options: SmartyClientOptions, client?: AxiosInstance) {
        this.client = client ?? axios.create({ timeout: options.timeoutMs });
    }

    buildParams(query: VerificationQuery): Record<string, string | number> {
        const params: Record<string, string | number> = {
            'auth-id': this.credentials.authId,
            'auth-token': this.credentials.authToken,
            street: query.street,
            city: query.city,
            state: query.state,
            zipcode: query.zipcode,
            candidates: 1,
            match: 'strict',
        };
        if (query.secondary) {
            params.secondary = query.secondary;
        }
        return params;
    }

    async verify(query: VerificationQuery): Promise<VerificationResult> {
        let data: unknown;
        try {
            const response = await this.client.get<unknown>(this.options.apiUrl, { params: this.buildParams(query) });
            data = response.data;
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            if (status !== undefined && REJECTED_CREDENTIAL_STATUSES.includes(status)) {
                throw new CredentialsRejectedError(this.options.apiUrl, status);
            }
            throw toHttpError(error, this.options.apiUrl);
        }

        const parsed = SmartyResponseSchema.safeParse(data);
        if (!parsed.success) return UNKNOWN_RESULT;
        return classifyCandidates(parsed.data);
    }
}
