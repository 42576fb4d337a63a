import { v4 as uuidv4, v5 as uuidv5 } from "uuid";
import { Identity, LedgerSnapshot, LedgerView, TransferKind, TransferRecord } from "../types";
import { computeVoterHash, LedgerStore } from "./db";
import { Clock, systemClock } from "./ledger/constants";
import { RecordingTransfer } from "./ledger/transfers";
import { VotingLedger } from "./ledger/votingLedger";

export interface LedgerServiceOptions {
    administrator: Identity;
    voteSecret: string;
    clock?: Clock;
}

/**
 * Owns the deployment's single ledger: runs operations one at a time and
 * persists after each one.
 *
 * The snapshot is written first and is the commit point: if it fails the
 * in-memory ledger is rolled back and no record is written. Vote and
 * transfer records follow the commit under ids derived from the ledger, so
 * writing one twice overwrites it.
 */
export class LedgerService {
    private queue: Promise<unknown> = Promise.resolve();

    private constructor(
        private readonly ledger: VotingLedger,
        private readonly transfers: RecordingTransfer,
        private readonly store: LedgerStore,
        private readonly voteSecret: string,
        private readonly clock: Clock,
    ) {}

    static async open(store: LedgerStore, options: LedgerServiceOptions) {
        const transfers = new RecordingTransfer();
        const clock = options.clock ?? systemClock;
        const stored = await store.loadLedger();

        if (stored) {
            if (stored.administrator !== options.administrator) {
                console.warn(
                    `Stored ledger ${stored.id} is administered by ${stored.administrator}; ignoring configured ADMIN_ID ${options.administrator}`,
                );
            }
            const ledger = VotingLedger.restore(stored, { transfer: transfers, clock });
            return new LedgerService(ledger, transfers, store, options.voteSecret, clock);
        }

        const ledger = new VotingLedger(options.administrator, { transfer: transfers, clock });
        await store.saveLedger(ledger.snapshot());
        console.log(`Ledger created: ${ledger.id}`);
        return new LedgerService(ledger, transfers, store, options.voteSecret, clock);
    }

    get id() {
        return this.ledger.id;
    }

    view(): LedgerView {
        return this.ledger.view();
    }

    snapshot(): LedgerSnapshot {
        return this.ledger.snapshot();
    }

    registerCandidate(caller: Identity, candidateId: Identity) {
        return this.run(() => this.ledger.registerCandidate(caller, candidateId));
    }

    startRound(caller: Identity) {
        return this.run(() => this.ledger.startRound(caller));
    }

    castVote(caller: Identity, candidateId: Identity, paidValue?: bigint) {
        return this.run(
            () => this.ledger.castVote(caller, candidateId, paidValue),
            async () => {
                const voterHash = computeVoterHash(this.voteSecret, this.ledger.id, caller);
                await this.store.saveVote({
                    id: uuidv5(`vote:${voterHash}`, this.ledger.id),
                    ledgerId: this.ledger.id,
                    voterHash,
                    candidate: candidateId,
                    amount: String(paidValue ?? 0n),
                    createdAt: this.clock(),
                });
            },
        );
    }

    closeRound(caller: Identity) {
        return this.run(() => this.ledger.closeRound(caller));
    }

    withdrawCommission(caller: Identity, destination: Identity) {
        return this.run(() => this.ledger.withdrawCommission(caller, destination));
    }

    getTransfers() {
        return this.store.getTransfersForLedger(this.ledger.id);
    }

    getVotes() {
        return this.store.getVotesForLedger(this.ledger.id);
    }

    private run<T>(operation: () => T, record?: () => Promise<void>): Promise<T> {
        const next = this.queue.then(() => this.apply(operation, record));
        this.queue = next.catch(() => undefined);
        return next;
    }

    private async apply<T>(operation: () => T, record?: () => Promise<void>): Promise<T> {
        const before = this.ledger.snapshot();
        let result: T;
        try {
            // a LedgerError here leaves the ledger untouched, nothing to roll back
            result = operation();
        } catch (err) {
            this.transfers.drain();
            throw err;
        }
        const pending = this.transfers.drain();

        try {
            await this.store.saveLedger(this.ledger.snapshot());
        } catch (err) {
            this.ledger.load(before);
            console.error(`Failed to persist ledger ${this.ledger.id}, rolled back:`, err);
            throw err;
        }

        // committed from here on; a failed record write is logged, the operation stands
        try {
            if (record) await record();
            for (const t of pending) await this.store.saveTransfer(this.transferRecord(t.kind, t.to, t.amount));
        } catch (err) {
            console.error(`Ledger ${this.ledger.id} committed but its records were not saved:`, err);
        }
        return result;
    }

    private transferRecord(kind: TransferKind, to: Identity, amount: bigint): TransferRecord {
        // one prize per ledger; withdrawals may repeat, each gets its own id
        const id = kind === "prize" ? uuidv5("prize", this.ledger.id) : uuidv4();
        return { id, ledgerId: this.ledger.id, kind, to, amount: amount.toString(), createdAt: this.clock() };
    }
}
