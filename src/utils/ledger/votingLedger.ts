import { v4 as uuidv4 } from "uuid";
import { Identity, LedgerSnapshot, LedgerView, Phase } from "../../types";
import { Clock, PRIZE_DIVISOR, PRIZE_SHARES, REGISTERED_SENTINEL, ROUND_DURATION, VOTE_FEE, systemClock } from "./constants";
import { Errors } from "./errors";
import { ValueTransfer } from "./transfers";

export interface LedgerOptions {
    transfer: ValueTransfer;
    clock?: Clock;
}

/**
 * Single-round paid plurality vote.
 *
 * Idle -> Started -> Closed, never back. Every operation either completes or
 * throws a LedgerError before touching state.
 */
export class VotingLedger {
    readonly id: string;
    readonly administrator: Identity;
    private createdAt: number;

    private phase: Phase = "Idle";
    private candidates: Identity[] = [];
    private tallies = new Map<Identity, number>();
    private currentWinner: Identity | null = null;
    private voters = new Set<Identity>();
    private startTimestamp: number | null = null;
    private balance = 0n;

    private readonly transfer: ValueTransfer;
    private readonly clock: Clock;

    constructor(administrator: Identity, options: LedgerOptions, id: string = uuidv4()) {
        this.id = id;
        this.administrator = administrator;
        this.transfer = options.transfer;
        this.clock = options.clock ?? systemClock;
        this.createdAt = this.clock();
    }

    static restore(snapshot: LedgerSnapshot, options: LedgerOptions) {
        const ledger = new VotingLedger(snapshot.administrator, options, snapshot.id);
        ledger.load(snapshot);
        return ledger;
    }

    // Guards

    private onlyOwner(caller: Identity) {
        if (caller !== this.administrator) throw Errors.NotAnOwner();
    }

    private onlyIdle() {
        if (this.phase !== "Idle") throw Errors.NotIdle();
    }

    private onlyStarted() {
        if (this.phase !== "Started") throw Errors.NotStarted();
    }

    private elapsed() {
        if (this.startTimestamp === null) throw Errors.NotStarted();
        return this.clock() - this.startTimestamp;
    }

    // Operations

    registerCandidate(caller: Identity, candidateId: Identity) {
        this.onlyOwner(caller);
        this.onlyIdle();
        if (this.tallyOf(candidateId) !== 0) throw Errors.AlreadyAddedCandidate();

        this.tallies.set(candidateId, REGISTERED_SENTINEL);
        this.candidates.push(candidateId);
    }

    startRound(caller: Identity) {
        this.onlyOwner(caller);
        this.onlyIdle();
        if (this.candidates.length === 0) throw Errors.NoCandidates();

        this.startTimestamp = this.clock();
        this.phase = "Started";
    }

    castVote(caller: Identity, candidateId: Identity, paidValue: bigint = 0n) {
        this.onlyStarted();
        if (this.elapsed() > ROUND_DURATION) throw Errors.VotingHasEnded();
        if (this.voters.has(caller)) throw Errors.OnlyOnce();
        if (paidValue !== VOTE_FEE) throw Errors.WrongFee();
        const tally = this.tallyOf(candidateId);
        if (tally === 0) throw Errors.UnknownCandidate();

        const next = tally + 1;
        this.tallies.set(candidateId, next);
        if (this.currentWinner === null || next > this.tallyOf(this.currentWinner)) {
            this.currentWinner = candidateId;
        }
        this.voters.add(caller);
        this.balance += paidValue;
    }

    /** Anyone may close once the deadline has strictly passed. Returns the prize paid. */
    closeRound(_caller: Identity): bigint {
        this.onlyStarted();
        if (!(this.elapsed() > ROUND_DURATION)) throw Errors.VotingHasNotEnded();

        let prize = 0n;
        if (this.currentWinner !== null) {
            prize = (this.balance / PRIZE_DIVISOR) * PRIZE_SHARES;
            this.transfer.transfer(this.currentWinner, prize, "prize");
        }

        this.balance -= prize;
        this.phase = "Closed";
        return prize;
    }

    /** Drains whatever balance remains; a second call transfers zero. Returns the amount sent. */
    withdrawCommission(caller: Identity, destination: Identity): bigint {
        this.onlyOwner(caller);
        if (this.phase !== "Closed") throw Errors.NotEnded();

        const amount = this.balance;
        this.transfer.transfer(destination, amount, "commission");
        this.balance = 0n;
        return amount;
    }

    // Queries

    getPhase(): Phase {
        return this.phase;
    }

    getOwner(): Identity {
        return this.administrator;
    }

    getBalance(): bigint {
        return this.balance;
    }

    getCandidates(): Identity[] {
        return [...this.candidates];
    }

    getStartTimestamp(): number | null {
        return this.startTimestamp;
    }

    getDeadline(): number | null {
        return this.startTimestamp === null ? null : this.startTimestamp + ROUND_DURATION;
    }

    getCurrentWinner(): Identity | null {
        return this.currentWinner;
    }

    /** Votes received, without the registration sentinel. */
    getVotes(candidateId: Identity): number {
        const tally = this.tallyOf(candidateId);
        return tally === 0 ? 0 : tally - REGISTERED_SENTINEL;
    }

    hasVoted(identity: Identity): boolean {
        return this.voters.has(identity);
    }

    view(): LedgerView {
        const candidates = this.candidates.map((id) => ({ id, votes: this.getVotes(id) }));
        return {
            id: this.id,
            phase: this.phase,
            administrator: this.administrator,
            balance: this.balance,
            candidates,
            totalVotes: this.voters.size,
            currentWinner: this.currentWinner,
            startTimestamp: this.startTimestamp,
            deadline: this.getDeadline(),
        };
    }

    snapshot(): LedgerSnapshot {
        return {
            id: this.id,
            administrator: this.administrator,
            phase: this.phase,
            candidates: [...this.candidates],
            tallies: Object.fromEntries(this.tallies),
            currentWinner: this.currentWinner,
            voters: [...this.voters],
            startTimestamp: this.startTimestamp,
            balance: this.balance.toString(),
            createdAt: this.createdAt,
        };
    }

    /** Replaces the mutable state with a snapshot of this same ledger. */
    load(snapshot: LedgerSnapshot) {
        if (snapshot.id !== this.id) throw new Error(`Snapshot ${snapshot.id} does not belong to ledger ${this.id}`);
        if (snapshot.phase !== "Idle" && snapshot.startTimestamp === null) {
            throw new Error(`Snapshot ${snapshot.id} is ${snapshot.phase} but has no start time`);
        }
        this.phase = snapshot.phase;
        this.candidates = [...snapshot.candidates];
        this.tallies = new Map(Object.entries(snapshot.tallies));
        this.currentWinner = snapshot.currentWinner;
        this.voters = new Set(snapshot.voters);
        this.startTimestamp = snapshot.startTimestamp;
        this.balance = BigInt(snapshot.balance);
        this.createdAt = snapshot.createdAt;
    }

    private tallyOf(candidateId: Identity) {
        return this.tallies.get(candidateId) ?? 0;
    }
}
