export const PHASES = ["Idle", "Started", "Closed"] as const;

export type Phase = (typeof PHASES)[number];

// Discord user id (snowflake) of whoever calls into the ledger
export type Identity = string;

export type LedgerErrorCode =
    | "Unauthorized"
    | "InvalidPhase"
    | "DuplicateCandidate"
    | "NoCandidates"
    | "RoundEnded"
    | "RoundNotEnded"
    | "RoundNotClosed"
    | "AlreadyVoted"
    | "WrongFee"
    | "UnknownCandidate";

export type TransferKind = "prize" | "commission";

export interface LedgerSnapshot {
    id: string;
    administrator: Identity;
    phase: Phase;
    candidates: Identity[];
    tallies: Record<Identity, number>; // includes the registration sentinel of 1
    currentWinner: Identity | null;
    voters: Identity[];
    startTimestamp: number | null; // seconds
    balance: string; // wei, decimal string
    createdAt: number;
}

export interface VoteRecord {
    id: string;
    ledgerId: string;
    // NOTE: we do NOT store the raw voter id, only an HMAC of it.
    voterHash: string;
    candidate: Identity;
    amount: string;
    createdAt: number;
}

export interface TransferRecord {
    id: string;
    ledgerId: string;
    kind: TransferKind;
    to: Identity;
    amount: string;
    createdAt: number;
}

export interface LedgerView {
    id: string;
    phase: Phase;
    administrator: Identity;
    balance: bigint;
    candidates: { id: Identity; votes: number }[];
    totalVotes: number;
    currentWinner: Identity | null;
    startTimestamp: number | null;
    deadline: number | null;
}
