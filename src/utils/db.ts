import crypto from "crypto";
import fs from "fs";
import path from "path";
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { LedgerSnapshot, Phase, TransferKind, TransferRecord, VoteRecord } from "../types";

export interface LedgerStore {
    loadLedger(): Promise<LedgerSnapshot | null>;
    saveLedger(snapshot: LedgerSnapshot): Promise<void>;
    saveVote(vote: VoteRecord): Promise<void>;
    getVotesForLedger(ledgerId: string): Promise<VoteRecord[]>;
    saveTransfer(transfer: TransferRecord): Promise<void>;
    getTransfersForLedger(ledgerId: string): Promise<TransferRecord[]>;
}

export interface StoreConfig {
    dbPath: string;
    supabaseUrl?: string;
    supabaseServiceKey?: string;
}

// One-way HMAC to anonymize the voter id per ledger
export function computeVoterHash(secret: string, ledgerId: string, voterId: string) {
    const h = crypto.createHmac("sha256", secret);
    h.update(`${ledgerId}:${voterId}`);
    return h.digest("hex");
}

export function createLedgerStore(config: StoreConfig): LedgerStore {
    if (config.supabaseUrl && config.supabaseServiceKey) {
        const client = createClient(config.supabaseUrl, config.supabaseServiceKey, {
            auth: { persistSession: false },
            global: { headers: { "x-client-info": "vote-ledger" } },
        });
        return new SupabaseLedgerStore(client);
    }
    return new FileLedgerStore(config.dbPath);
}

/* ---------- File fallback (local dev) ---------- */

interface FileData {
    ledger: LedgerSnapshot | null;
    votes: Record<string, VoteRecord>;
    transfers: Record<string, TransferRecord>;
}

export class FileLedgerStore implements LedgerStore {
    constructor(private readonly dbPath: string) {}

    private ensureFileStorage() {
        const dir = path.dirname(this.dbPath);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        if (!fs.existsSync(this.dbPath)) this.writeAll({ ledger: null, votes: {}, transfers: {} });
    }

    private readAll(): FileData {
        this.ensureFileStorage();
        const data: Partial<FileData> = JSON.parse(fs.readFileSync(this.dbPath, "utf8"));
        return { ledger: data.ledger ?? null, votes: data.votes ?? {}, transfers: data.transfers ?? {} };
    }

    private writeAll(data: FileData) {
        fs.writeFileSync(this.dbPath, JSON.stringify(data, null, 2), "utf8");
    }

    async loadLedger() {
        return this.readAll().ledger;
    }

    async saveLedger(snapshot: LedgerSnapshot) {
        const db = this.readAll();
        db.ledger = snapshot;
        this.writeAll(db);
    }

    async saveVote(vote: VoteRecord) {
        const db = this.readAll();
        db.votes[vote.id] = vote;
        this.writeAll(db);
    }

    async getVotesForLedger(ledgerId: string) {
        const db = this.readAll();
        return Object.values(db.votes)
            .filter((v) => v.ledgerId === ledgerId)
            .sort((a, b) => a.createdAt - b.createdAt);
    }

    async saveTransfer(transfer: TransferRecord) {
        const db = this.readAll();
        db.transfers[transfer.id] = transfer;
        this.writeAll(db);
    }

    async getTransfersForLedger(ledgerId: string) {
        const db = this.readAll();
        return Object.values(db.transfers)
            .filter((t) => t.ledgerId === ledgerId)
            .sort((a, b) => a.createdAt - b.createdAt);
    }
}

/* ---------- Supabase (server-side) ---------- */

interface LedgerRow {
    id: string;
    administrator: string;
    phase: Phase;
    candidates: string[] | null;
    tallies: Record<string, number> | null;
    currentwinner: string | null;
    voters: string[] | null;
    starttimestamp: number | null;
    balance: string;
    createdat: number;
}

interface VoteRow {
    id: string;
    ledgerid: string;
    voterhash: string;
    candidate: string;
    amount: string;
    createdat: number;
}

interface TransferRow {
    id: string;
    ledgerid: string;
    kind: TransferKind;
    recipient: string;
    amount: string;
    createdat: number;
}

export class SupabaseLedgerStore implements LedgerStore {
    constructor(private readonly supabase: SupabaseClient) {}

    async loadLedger() {
        const { data, error } = await this.supabase
            .from("ledgers")
            .select("*")
            .order("createdat", { ascending: false })
            .limit(1)
            .maybeSingle();
        if (error) throw error;
        if (!data) return null;
        const row: LedgerRow = data;
        return {
            id: row.id,
            administrator: row.administrator,
            phase: row.phase,
            candidates: row.candidates ?? [],
            tallies: row.tallies ?? {},
            currentWinner: row.currentwinner,
            voters: row.voters ?? [],
            startTimestamp: row.starttimestamp === null ? null : Number(row.starttimestamp),
            balance: String(row.balance),
            createdAt: Number(row.createdat),
        };
    }

    async saveLedger(snapshot: LedgerSnapshot) {
        const row: LedgerRow = {
            id: snapshot.id,
            administrator: snapshot.administrator,
            phase: snapshot.phase,
            candidates: snapshot.candidates,
            tallies: snapshot.tallies,
            currentwinner: snapshot.currentWinner,
            voters: snapshot.voters,
            starttimestamp: snapshot.startTimestamp,
            balance: snapshot.balance,
            createdat: snapshot.createdAt,
        };
        const { error } = await this.supabase.from("ledgers").upsert(row);
        if (error) throw error;
    }

    async saveVote(vote: VoteRecord) {
        const row: VoteRow = {
            id: vote.id,
            ledgerid: vote.ledgerId,
            voterhash: vote.voterHash,
            candidate: vote.candidate,
            amount: vote.amount,
            createdat: vote.createdAt,
        };
        const { error } = await this.supabase.from("votes").upsert(row);
        if (error) throw error;
    }

    async getVotesForLedger(ledgerId: string) {
        const { data, error } = await this.supabase
            .from("votes")
            .select("*")
            .eq("ledgerid", ledgerId)
            .order("createdat", { ascending: true });
        if (error) throw error;
        const rows: VoteRow[] = data ?? [];
        return rows.map((r) => ({
            id: r.id,
            ledgerId: r.ledgerid,
            voterHash: r.voterhash,
            candidate: r.candidate,
            amount: String(r.amount),
            createdAt: Number(r.createdat),
        }));
    }

    async saveTransfer(transfer: TransferRecord) {
        const row: TransferRow = {
            id: transfer.id,
            ledgerid: transfer.ledgerId,
            kind: transfer.kind,
            recipient: transfer.to,
            amount: transfer.amount,
            createdat: transfer.createdAt,
        };
        const { error } = await this.supabase.from("transfers").upsert(row);
        if (error) throw error;
    }

    async getTransfersForLedger(ledgerId: string) {
        const { data, error } = await this.supabase
            .from("transfers")
            .select("*")
            .eq("ledgerid", ledgerId)
            .order("createdat", { ascending: true });
        if (error) throw error;
        const rows: TransferRow[] = data ?? [];
        return rows.map((r) => ({
            id: r.id,
            ledgerId: r.ledgerid,
            kind: r.kind,
            to: r.recipient,
            amount: String(r.amount),
            createdAt: Number(r.createdat),
        }));
    }
}
