import { createPublicClient, http, type PublicClient, type Transport } from "viem";

/** Creates a public client from the provided options */
export const createClient = (options: {
  transport?: Transport;
  rpcUrl?: string;
  pollingInterval?: number;
}): PublicClient => {
  const { transport, rpcUrl, pollingInterval } = options;
  if (!transport && !rpcUrl)
    throw new Error("You need to provide a rpcUrl or a transport if you don't provide a client directly");

  return createPublicClient({
    // Submissions are never retried behind the caller's back
    transport: transport ?? http(rpcUrl, { retryCount: 0 }),
    pollingInterval,
  });
};

/** Compares addresses regardless of checksum casing */
export const sameAddress = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();
