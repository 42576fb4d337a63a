import { isLedgerError } from "../src/utils/ledger/errors";
import { LedgerErrorCode } from "../src/types";

export const OWNER = "100000000000000001";
export const CANDIDATE_A = "100000000000000011";
export const CANDIDATE_B = "100000000000000012";
export const CANDIDATE_C = "100000000000000013";
export const VOTER_1 = "100000000000000021";
export const VOTER_2 = "100000000000000022";
export const VOTER_3 = "100000000000000023";
export const OUTSIDER = "100000000000000099";

export const START = 1_700_000_000;

/** Runs fn and returns the LedgerError code it threw, or null when it did not throw. */
export function codeOf(fn: () => unknown): LedgerErrorCode | null {
    try {
        fn();
    } catch (err) {
        if (isLedgerError(err)) return err.code;
        throw err;
    }
    return null;
}

export function fakeClock(start = START) {
    let now = start;
    return {
        clock: () => now,
        set(value: number) {
            now = value;
        },
        advance(seconds: number) {
            now += seconds;
        },
    };
}
