import { formatEther, parseEther } from "ethers";

/** Parses a decimal amount of the native unit ("0.01") into wei; null when unparsable. */
export function parseAmount(raw: string): bigint | null {
    const value = raw.trim();
    if (!/^\d+(\.\d+)?$/.test(value)) return null;
    try {
        return parseEther(value);
    } catch (err) {
        // more than 18 decimals
        console.warn(`Rejected amount "${value}":`, err instanceof Error ? err.message : err);
        return null;
    }
}

export function formatAmount(wei: bigint) {
    return `${formatEther(wei)} ETH`;
}
