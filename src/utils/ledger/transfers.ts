import { Identity, TransferKind } from "../../types";
import { TransferError } from "./errors";

/**
 * Port the ledger pays out through. A transfer either completes or throws;
 * the ledger calls it before committing anything, so a throw leaves the
 * ledger untouched.
 */
export interface ValueTransfer {
    transfer(to: Identity, amount: bigint, kind: TransferKind): void;
}

export interface PendingTransfer {
    to: Identity;
    amount: bigint;
    kind: TransferKind;
}

const SNOWFLAKE = /^\d{17,20}$/;

export function isDiscordId(value: string) {
    return SNOWFLAKE.test(value);
}

/**
 * Collects transfers in memory so the caller can persist them once the
 * ledger operation has succeeded.
 */
export class RecordingTransfer implements ValueTransfer {
    private pending: PendingTransfer[] = [];

    transfer(to: Identity, amount: bigint, kind: TransferKind) {
        if (!isDiscordId(to)) throw new TransferError(`Cannot pay out to "${to}": not a Discord user id`);
        if (amount < 0n) throw new TransferError("Cannot transfer a negative amount");
        this.pending.push({ to, amount, kind });
    }

    drain(): PendingTransfer[] {
        const out = this.pending;
        this.pending = [];
        return out;
    }
}
