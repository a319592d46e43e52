/**
 * Tests for the app with API key auth enforced.
 *
 * The key, not any header, decides which account a call acts for.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, TOKEN } from "./setup.js";
import type { Envelope, ErrorBody } from "./setup.js";
import type { ApiKeyRecord } from "../src/types/auth.js";

const KEYS: ApiKeyRecord[] = [
  { key: "admin-key", role: "admin", account: "admin" },
  { key: "alice-key", role: "operator", account: "alice" },
  { key: "audit-key", role: "viewer", account: "auditor" },
];

function securedApp() {
  return createTestApp({
    auth: { apiKeys: new Map(KEYS.map((k): [string, ApiKeyRecord] => [k.key, k])) },
  });
}

const streamBody = {
  recipient: "bob",
  token: TOKEN,
  totalAmount: "100",
  startTime: "1000",
  endTime: "2000",
};

describe("secured mode", () => {
  it("rejects API calls without credentials", async () => {
    const { app } = securedApp();
    const res = await app.request("/api/v1/streams/0");
    expect(res.status).toBe(401);
  });

  it("keeps health routes open", async () => {
    const { app } = securedApp();
    expect((await app.request("/health")).status).toBe(200);
  });

  it("acts for the key's account and ignores X-Account-Id", async () => {
    const { app } = securedApp();
    await app.request(
      jsonRequest(
        "/api/v1/ledger/mint",
        "POST",
        { account: "alice", token: TOKEN, amount: "100" },
        { "X-Api-Key": "admin-key" },
      ),
    );

    const res = await app.request(
      jsonRequest("/api/v1/streams", "POST", streamBody, {
        "X-Api-Key": "alice-key",
        "X-Account-Id": "mallory",
      }),
    );

    expect(res.status).toBe(201);
    expect(((await res.json()) as Envelope<{ sender: string }>).data.sender).toBe("alice");
  });

  it("lets an operator create but not mint", async () => {
    const { app } = securedApp();
    const res = await app.request(
      jsonRequest(
        "/api/v1/ledger/mint",
        "POST",
        { account: "alice", token: TOKEN, amount: "100" },
        { "X-Api-Key": "alice-key" },
      ),
    );
    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("FORBIDDEN");
  });

  it("lets a viewer read but not write", async () => {
    const { app } = securedApp();
    const read = await app.request("/api/v1/ledger/balances/alice/USDC", {
      headers: { "X-Api-Key": "audit-key" },
    });
    expect(read.status).toBe(200);

    const write = await app.request(
      jsonRequest("/api/v1/streams", "POST", streamBody, { "X-Api-Key": "audit-key" }),
    );
    expect(write.status).toBe(403);
  });
});
