import { LedgerErrorCode } from "../../types";

export class LedgerError extends Error {
    readonly code: LedgerErrorCode;

    constructor(code: LedgerErrorCode, message: string) {
        super(message);
        this.name = "LedgerError";
        this.code = code;
    }
}

/** Raised when a payout cannot reach its recipient; aborts the enclosing operation. */
export class TransferError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "TransferError";
    }
}

export const Errors = {
    NotAnOwner: () => new LedgerError("Unauthorized", "Caller is not an owner"),
    OnlyOnce: () => new LedgerError("AlreadyVoted", "Transaction allowed only once"),
    NotIdle: () => new LedgerError("InvalidPhase", "Voting isn't in 'idle' state"),
    NotStarted: () => new LedgerError("InvalidPhase", "Voting isn't in 'started' state"),
    AlreadyAddedCandidate: () => new LedgerError("DuplicateCandidate", "Candidate has already added"),
    NoCandidates: () => new LedgerError("NoCandidates", "Can't start without candidates"),
    VotingHasEnded: () => new LedgerError("RoundEnded", "Voting has been ended"),
    WrongFee: () => new LedgerError("WrongFee", "Should be 0.01 Ether"),
    UnknownCandidate: () => new LedgerError("UnknownCandidate", "Candidate hasn't been proposed"),
    VotingHasNotEnded: () => new LedgerError("RoundNotEnded", "Voting hasn't been ended"),
    NotEnded: () => new LedgerError("RoundNotClosed", "Profit hasn't been paid"),
};

export function isLedgerError(err: unknown): err is LedgerError {
    return err instanceof LedgerError;
}
