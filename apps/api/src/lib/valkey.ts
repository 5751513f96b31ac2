import { Redis } from "ioredis";

/** Valkey/Redis client for the shared rate-limit store, or null when no URL is set. */
export function createValkey(url: string | undefined): Redis | null {
  if (!url) return null;
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });
}
