import { createClient, type Client } from "@libsql/client";

import { CATALOG_DATABASE_URL, getCatalogAuthToken } from "@/lib/config";
import { CatalogUnavailableError, describeError } from "@/lib/agent/errors";

let client: Client | null = null;

export function getDb(): Client {
  if (!client) {
    try {
      client = createClient({
        url: CATALOG_DATABASE_URL,
        authToken: getCatalogAuthToken(),
      });
    } catch (error) {
      throw new CatalogUnavailableError(
        `Cannot open catalog at ${CATALOG_DATABASE_URL}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  return client;
}

/**
 * Drops the cached client so the next getDb() reconnects.
 */
export function resetDb(): void {
  client?.close();
  client = null;
}
