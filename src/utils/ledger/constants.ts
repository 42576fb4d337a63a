import { parseEther } from "ethers";

/** Exact amount every vote must carry: 0.01 of the native unit, in wei. */
export const VOTE_FEE = parseEther("0.01");

/** Length of the voting window in seconds (3 days). */
export const ROUND_DURATION = 3 * 24 * 60 * 60;

// winner receives floor(balance / 10) * 9, the remainder is commission
export const PRIZE_DIVISOR = 10n;
export const PRIZE_SHARES = 9n;

// tally value a candidate gets on registration; 0 means "not registered"
export const REGISTERED_SENTINEL = 1;

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
