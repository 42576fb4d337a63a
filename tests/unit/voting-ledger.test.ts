/**
 * VotingLedger Unit Tests.
 *
 * Phase machine, candidate registry, paid votes, close payout and commission.
 */
import { beforeEach, describe, expect, it } from "vitest";
import { ROUND_DURATION, VOTE_FEE } from "../../src/utils/ledger/constants";
import { LedgerError, TransferError } from "../../src/utils/ledger/errors";
import { RecordingTransfer, ValueTransfer } from "../../src/utils/ledger/transfers";
import { VotingLedger } from "../../src/utils/ledger/votingLedger";
import {
    CANDIDATE_A,
    CANDIDATE_B,
    CANDIDATE_C,
    codeOf,
    fakeClock,
    OUTSIDER,
    OWNER,
    START,
    VOTER_1,
    VOTER_2,
    VOTER_3,
} from "../helpers";

describe("VotingLedger", () => {
    let time: ReturnType<typeof fakeClock>;
    let transfers: RecordingTransfer;
    let voting: VotingLedger;

    beforeEach(() => {
        time = fakeClock();
        transfers = new RecordingTransfer();
        voting = new VotingLedger(OWNER, { transfer: transfers, clock: time.clock });
    });

    const passTime = () => time.advance(ROUND_DURATION + 1);

    describe("Basic", () => {
        it("should set the right owner and start idle", () => {
            expect(voting.getOwner()).toBe(OWNER);
            expect(voting.getPhase()).toBe("Idle");
            expect(voting.getBalance()).toBe(0n);
            expect(voting.getStartTimestamp()).toBeNull();
        });

        it("happy path: three candidates, B wins 2 to 1", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.registerCandidate(OWNER, CANDIDATE_B);
            voting.registerCandidate(OWNER, CANDIDATE_C);
            expect(voting.getCandidates()).toEqual([CANDIDATE_A, CANDIDATE_B, CANDIDATE_C]);

            voting.startRound(OWNER);
            expect(voting.getPhase()).toBe("Started");

            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            voting.castVote(VOTER_2, CANDIDATE_B, VOTE_FEE);
            voting.castVote(VOTER_3, CANDIDATE_B, VOTE_FEE);
            expect(voting.getBalance()).toBe(30_000_000_000_000_000n);
            expect(voting.getCurrentWinner()).toBe(CANDIDATE_B);

            passTime();
            const prize = voting.closeRound(OUTSIDER);

            expect(prize).toBe(27_000_000_000_000_000n);
            expect(voting.getPhase()).toBe("Closed");
            expect(voting.getBalance()).toBe(3_000_000_000_000_000n);
            expect(transfers.drain()).toEqual([{ to: CANDIDATE_B, amount: 27_000_000_000_000_000n, kind: "prize" }]);

            const commission = voting.withdrawCommission(OWNER, OUTSIDER);
            expect(commission).toBe(3_000_000_000_000_000n);
            expect(voting.getBalance()).toBe(0n);
            expect(transfers.drain()).toEqual([{ to: OUTSIDER, amount: 3_000_000_000_000_000n, kind: "commission" }]);
        });

        it("single vote: winner gets 90%, owner drains the rest", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            passTime();

            expect(voting.closeRound(VOTER_1)).toBe(9_000_000_000_000_000n);
            expect(voting.withdrawCommission(OWNER, OWNER)).toBe(1_000_000_000_000_000n);
            expect(voting.getBalance()).toBe(0n);
        });
    });

    describe("Candidates", () => {
        it("should return empty array of candidates", () => {
            expect(voting.getCandidates()).toEqual([]);
        });

        it("should add candidate and stay idle", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            expect(voting.getCandidates().at(-1)).toBe(CANDIDATE_A);
            expect(voting.getPhase()).toBe("Idle");
            expect(voting.getVotes(CANDIDATE_A)).toBe(0);
        });

        it("should add candidate only once", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            expect(codeOf(() => voting.registerCandidate(OWNER, CANDIDATE_A))).toBe("DuplicateCandidate");
            expect(voting.getCandidates()).toEqual([CANDIDATE_A]);
        });

        it("should restrict adding candidate by not owner", () => {
            expect(() => voting.registerCandidate(CANDIDATE_A, CANDIDATE_A)).toThrow("Caller is not an owner");
            expect(codeOf(() => voting.registerCandidate(CANDIDATE_A, CANDIDATE_A))).toBe("Unauthorized");
        });

        it("should check ownership before phase", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            expect(codeOf(() => voting.registerCandidate(OUTSIDER, CANDIDATE_B))).toBe("Unauthorized");
        });

        it("should restrict adding candidates after voting has been started", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            expect(() => voting.registerCandidate(OWNER, CANDIDATE_B)).toThrow("Voting isn't in 'idle' state");
        });

        it("should restrict adding candidates after voting has been closed", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            passTime();
            voting.closeRound(OWNER);
            expect(codeOf(() => voting.registerCandidate(OWNER, CANDIDATE_B))).toBe("InvalidPhase");
        });
    });

    describe("Voting launch", () => {
        it("should use the clock as start time", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            time.set(START + 42);
            voting.startRound(OWNER);
            expect(voting.getStartTimestamp()).toBe(START + 42);
            expect(voting.getDeadline()).toBe(START + 42 + ROUND_DURATION);
        });

        it("should restrict launch without candidates", () => {
            expect(() => voting.startRound(OWNER)).toThrow("Can't start without candidates");
            expect(voting.getPhase()).toBe("Idle");
        });

        it("should restrict launch by not owner", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            expect(codeOf(() => voting.startRound(CANDIDATE_A))).toBe("Unauthorized");
        });

        it("should be started only once", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            time.advance(10);
            expect(codeOf(() => voting.startRound(OWNER))).toBe("InvalidPhase");
            expect(voting.getStartTimestamp()).toBe(START);
        });
    });

    describe("Voting process", () => {
        beforeEach(() => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.registerCandidate(OWNER, CANDIDATE_B);
            voting.startRound(OWNER);
        });

        it("should be able to vote only once for one candidate", () => {
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            expect(() => voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE)).toThrow("Transaction allowed only once");
            expect(voting.getVotes(CANDIDATE_A)).toBe(1);
        });

        it("should be able to vote only once at all", () => {
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            expect(codeOf(() => voting.castVote(VOTER_1, CANDIDATE_B, VOTE_FEE))).toBe("AlreadyVoted");
            expect(voting.getVotes(CANDIDATE_B)).toBe(0);
            expect(voting.getBalance()).toBe(VOTE_FEE);
        });

        it("should be able to vote only for exactly 0.01 eth", () => {
            // More than needed
            expect(codeOf(() => voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE * 2n))).toBe("WrongFee");
            // Less than needed
            expect(codeOf(() => voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE / 2n))).toBe("WrongFee");
            // 0
            expect(codeOf(() => voting.castVote(VOTER_1, CANDIDATE_A, 0n))).toBe("WrongFee");
            // undefined
            expect(() => voting.castVote(VOTER_1, CANDIDATE_A)).toThrow("Should be 0.01 Ether");

            expect(voting.hasVoted(VOTER_1)).toBe(false);
            expect(voting.getBalance()).toBe(0n);
        });

        it("should restrict voting for unproposed candidate", () => {
            expect(() => voting.castVote(VOTER_1, OUTSIDER, VOTE_FEE)).toThrow("Candidate hasn't been proposed");
            // a rejected vote does not use up the voter's one vote
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            expect(voting.hasVoted(VOTER_1)).toBe(true);
        });

        it("should report the repeat vote before the fee", () => {
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            expect(codeOf(() => voting.castVote(VOTER_1, CANDIDATE_A, 0n))).toBe("AlreadyVoted");
        });

        it("should report the fee before the unknown candidate", () => {
            expect(codeOf(() => voting.castVote(VOTER_1, OUTSIDER, 0n))).toBe("WrongFee");
        });

        it("should still accept a vote exactly at the deadline", () => {
            time.set(START + ROUND_DURATION);
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            expect(voting.getVotes(CANDIDATE_A)).toBe(1);
        });

        it("should not allow to vote after voting is ended", () => {
            time.set(START + ROUND_DURATION + 1);
            expect(() => voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE)).toThrow("Voting has been ended");
        });

        it("should keep the first candidate to reach a count on ties", () => {
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            voting.castVote(VOTER_2, CANDIDATE_B, VOTE_FEE);
            expect(voting.getCurrentWinner()).toBe(CANDIDATE_A);
            voting.castVote(VOTER_3, CANDIDATE_B, VOTE_FEE);
            expect(voting.getCurrentWinner()).toBe(CANDIDATE_B);
        });
    });

    it("should not allow to vote before start", () => {
        voting.registerCandidate(OWNER, CANDIDATE_A);
        expect(() => voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE)).toThrow("Voting isn't in 'started' state");
    });

    describe("after successful voting", () => {
        beforeEach(() => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.registerCandidate(OWNER, CANDIDATE_B);
            voting.startRound(OWNER);
            voting.castVote(OWNER, CANDIDATE_A, VOTE_FEE);
            voting.castVote(CANDIDATE_A, CANDIDATE_B, VOTE_FEE);
            voting.castVote(CANDIDATE_B, CANDIDATE_B, VOTE_FEE);
            // CANDIDATE_B is the winner
        });

        it("should not be able to close voting before end", () => {
            expect(codeOf(() => voting.closeRound(OWNER))).toBe("RoundNotEnded");
            time.set(START + ROUND_DURATION);
            expect(() => voting.closeRound(OUTSIDER)).toThrow("Voting hasn't been ended");
            expect(voting.getPhase()).toBe("Started");
        });

        it("anyone should be able to close voting", () => {
            time.set(START + ROUND_DURATION + 1);
            const balance = VOTE_FEE * 3n;
            const winnerSum = (balance / 10n) * 9n;

            expect(voting.closeRound(OUTSIDER)).toBe(winnerSum);
            expect(transfers.drain()).toEqual([{ to: CANDIDATE_B, amount: winnerSum, kind: "prize" }]);
            expect(voting.getPhase()).toBe("Closed");
        });

        it("should not close twice", () => {
            passTime();
            voting.closeRound(OWNER);
            expect(codeOf(() => voting.closeRound(OWNER))).toBe("InvalidPhase");
        });

        it("should not able to withdraw commission before voting been closed", () => {
            expect(() => voting.withdrawCommission(OWNER, OWNER)).toThrow("Profit hasn't been paid");
            expect(codeOf(() => voting.withdrawCommission(OWNER, OWNER))).toBe("RoundNotClosed");
        });

        it("owner should be able to withdraw commission, twice", () => {
            passTime();
            voting.closeRound(OWNER);
            transfers.drain();

            expect(voting.withdrawCommission(OWNER, OWNER)).toBe((VOTE_FEE * 3n) / 10n);
            expect(voting.withdrawCommission(OWNER, OWNER)).toBe(0n);
            expect(transfers.drain().map((t) => t.amount)).toEqual([3_000_000_000_000_000n, 0n]);
        });

        it("only owner should be able to withdraw commission", () => {
            passTime();
            voting.closeRound(OWNER);
            expect(codeOf(() => voting.withdrawCommission(CANDIDATE_A, CANDIDATE_A))).toBe("Unauthorized");
        });
    });

    it("should skip paying prize if no one voted", () => {
        voting.registerCandidate(OWNER, CANDIDATE_A);
        voting.startRound(OWNER);
        passTime();
        expect(voting.closeRound(OWNER)).toBe(0n);
        expect(voting.getPhase()).toBe("Closed");
        expect(transfers.drain()).toEqual([]);
        expect(voting.withdrawCommission(OWNER, OWNER)).toBe(0n);
    });

    describe("failed payouts", () => {
        it("should leave the round open when the prize cannot be paid", () => {
            const refusing: ValueTransfer = {
                transfer() {
                    throw new TransferError("recipient refused");
                },
            };
            const ledger = new VotingLedger(OWNER, { transfer: refusing, clock: time.clock });
            ledger.registerCandidate(OWNER, CANDIDATE_A);
            ledger.startRound(OWNER);
            ledger.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            passTime();
            const before = ledger.snapshot();

            expect(() => ledger.closeRound(OWNER)).toThrow(TransferError);
            expect(ledger.snapshot()).toEqual(before);
        });

        it("should keep the commission when the destination is not a user id", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            voting.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE);
            passTime();
            voting.closeRound(OWNER);

            expect(() => voting.withdrawCommission(OWNER, "nobody")).toThrow(TransferError);
            expect(voting.getBalance()).toBe(1_000_000_000_000_000n);
        });
    });

    describe("snapshots", () => {
        it("should restore an identical ledger", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.registerCandidate(OWNER, CANDIDATE_B);
            voting.startRound(OWNER);
            voting.castVote(VOTER_1, CANDIDATE_B, VOTE_FEE);

            const json = JSON.parse(JSON.stringify(voting.snapshot()));
            const restored = VotingLedger.restore(json, { transfer: transfers, clock: time.clock });

            expect(restored.id).toBe(voting.id);
            expect(restored.view()).toEqual(voting.view());
            expect(codeOf(() => restored.castVote(VOTER_1, CANDIDATE_A, VOTE_FEE))).toBe("AlreadyVoted");
            restored.castVote(VOTER_2, CANDIDATE_A, VOTE_FEE);
            expect(restored.getBalance()).toBe(VOTE_FEE * 2n);
        });

        it("should refuse a snapshot of another ledger", () => {
            const other = new VotingLedger(OWNER, { transfer: transfers, clock: time.clock });
            expect(() => voting.load(other.snapshot())).toThrow(/does not belong/);
        });

        it("should refuse a started snapshot without a start time", () => {
            voting.registerCandidate(OWNER, CANDIDATE_A);
            voting.startRound(OWNER);
            const broken = { ...voting.snapshot(), startTimestamp: null };

            expect(() => VotingLedger.restore(broken, { transfer: transfers, clock: time.clock })).toThrow(
                /is Started but has no start time/,
            );
        });
    });

    it("should only throw LedgerError for rule violations", () => {
        expect(() => voting.startRound(OUTSIDER)).toThrow(LedgerError);
    });
});
