/**
 * @ledger-module: ConsentApiTests
 * @ledger-risk: low
 * @ledger-ethics: high
 * @ledger-scope: test
 *
 * @description: Drives the HTTP API end to end against an in-memory ledger,
 * covering writes, revocation, verification and write admission.
 *
 * @impact
 * Risk: Missing coverage could let unauthenticated writes or wrong status codes ship.
 * Ethics: Confirms third parties see revoked consent as revoked.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import crypto from 'node:crypto';
import { createReceipt, hashReceipt, signRevocation, type ConsentReceipt } from '@reciprocal/consent-core';
import { ConsentLedger, MemoryLedgerLog } from '@reciprocal/shared';

import { createConsentServer } from '../src/app.js';
import { loadRuntimeConfig } from '../src/config.js';
import { SimpleRateLimiter } from '../src/services/rateLimiter.js';
import type { LogRequest } from '../src/utils/requestLogger.js';

type JsonBody = Record<string, unknown>;

const WRITE_TOKEN = 'test-token';
const BASE = Date.parse('2026-01-01T00:00:00.000Z');
const at = (seconds: number) => new Date(BASE + seconds * 1000);
const iso = (seconds: number) => at(seconds).toISOString();

const grantor = crypto.generateKeyPairSync('ed25519');
const stranger = crypto.generateKeyPairSync('ed25519');

const quietLog: LogRequest = () => undefined;

const receiptFor = (overrides: Partial<Parameters<typeof createReceipt>[0]> = {}): ConsentReceipt =>
  createReceipt(
    {
      subjectId: 'subject-1',
      grantorId: 'grantor-1',
      scope: ['analytics', 'training'],
      issuedAt: at(0),
      expiresAt: at(100),
      ...overrides
    },
    grantor
  );

async function startApi(options: { rateLimit?: number } = {}) {
  const clock = { seconds: 0 };
  const ledger = await ConsentLedger.open({
    log: new MemoryLedgerLog(),
    pseudonymizationSecret: 'test-secret',
    now: () => at(clock.seconds)
  });
  const config = loadRuntimeConfig({
    CONSENT_API_WRITE_TOKEN: WRITE_TOKEN,
    CONSENT_ALLOWED_ORIGINS: 'http://localhost:8080'
  });
  const writeLimiter = new SimpleRateLimiter({ limit: options.rateLimit ?? 100, window: 60000 });
  const server = createConsentServer({ ledger, config, writeLimiter, logRequest: quietLog });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind a TCP port');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const close = async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await ledger.close();
  };

  return { baseUrl, ledger, clock, close };
}

const readJson = async (response: Response): Promise<JsonBody> => (await response.json()) as JsonBody;

const postJson = (url: string, payload: unknown, token: string | null = WRITE_TOKEN) =>
  fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...(token === null ? {} : { 'X-Consent-Ledger-Token': token })
    },
    body: JSON.stringify(payload)
  });

test('POST /api/receipts appends and GET returns the stored receipt', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const created = await postJson(`${api.baseUrl}/api/receipts`, receipt);
    assert.equal(created.status, 201);
    const createdBody = await readJson(created);
    assert.equal(createdBody.receiptHash, hashReceipt(receipt));
    assert.equal(createdBody.anchor, api.ledger.anchor());

    const fetched = await fetch(`${api.baseUrl}/api/receipts/${hashReceipt(receipt)}`);
    assert.equal(fetched.status, 200);
    assert.equal(fetched.headers.get('cache-control'), 'no-store');
    const fetchedBody = await readJson(fetched);
    assert.deepEqual(fetchedBody.receipt, receipt);
    assert.equal(fetchedBody.revocation, null);
  } finally {
    await api.close();
  }
});

test('duplicate and unknown receipts map to 409 and 404', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    assert.equal((await postJson(`${api.baseUrl}/api/receipts`, receipt)).status, 201);

    const duplicate = await postJson(`${api.baseUrl}/api/receipts`, receipt);
    assert.equal(duplicate.status, 409);
    assert.deepEqual(await readJson(duplicate), {
      error: { code: 'DUPLICATE_RECEIPT', message: `Receipt ${hashReceipt(receipt)} already exists.` }
    });

    const missingHash = 'f'.repeat(64);
    const missing = await fetch(`${api.baseUrl}/api/receipts/${missingHash}`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await readJson(missing), {
      error: { code: 'NOT_FOUND', message: `Receipt ${missingHash} not found.` }
    });
  } finally {
    await api.close();
  }
});

test('writes require the configured token', async () => {
  const api = await startApi();
  try {
    const missing = await postJson(`${api.baseUrl}/api/receipts`, receiptFor(), null);
    assert.equal(missing.status, 401);
    assert.deepEqual(await readJson(missing), { error: { code: 'UNAUTHORIZED', message: 'Missing write token' } });

    const wrong = await postJson(`${api.baseUrl}/api/receipts`, receiptFor(), 'not-the-token');
    assert.equal(wrong.status, 403);
    assert.deepEqual(await readJson(wrong), { error: { code: 'FORBIDDEN', message: 'Invalid write token' } });

    assert.equal(api.ledger.summary().receiptsIssued, 0);
  } finally {
    await api.close();
  }
});

test('malformed bodies are rejected before reaching the ledger', async () => {
  const api = await startApi();
  try {
    const invalidJson = await fetch(`${api.baseUrl}/api/receipts`, {
      method: 'POST',
      headers: { 'X-Consent-Ledger-Token': WRITE_TOKEN },
      body: '{"subjectId":'
    });
    assert.equal(invalidJson.status, 400);
    assert.deepEqual(await readJson(invalidJson), { error: { code: 'BAD_REQUEST', message: 'Invalid JSON body' } });

    const { signature: _signature, ...unsigned } = receiptFor();
    const invalidReceipt = await postJson(`${api.baseUrl}/api/receipts`, unsigned);
    assert.equal(invalidReceipt.status, 400);
    assert.deepEqual(await readJson(invalidReceipt), {
      error: { code: 'INVALID_RECEIPT', message: 'Receipt from "append" is invalid (missing field signature).' }
    });
  } finally {
    await api.close();
  }
});

test('status reflects expiry and revocation at the requested instant', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const receiptHash = hashReceipt(receipt);
    await postJson(`${api.baseUrl}/api/receipts`, receipt);

    const statusAt = async (instant: string) => {
      const response = await fetch(`${api.baseUrl}/api/receipts/${receiptHash}/status?at=${encodeURIComponent(instant)}`);
      return { code: response.status, body: await readJson(response) };
    };

    assert.deepEqual(await statusAt(iso(100)), { code: 200, body: { receiptHash, status: 'active', at: iso(100) } });
    assert.equal((await statusAt(iso(101))).body.status, 'expired');

    api.clock.seconds = 10;
    const revoked = await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, {
      signature: signRevocation(receiptHash, grantor.privateKey)
    });
    assert.equal(revoked.status, 201);
    const revokedBody = await readJson(revoked);
    assert.deepEqual(revokedBody.revocation, {
      receiptHash,
      revokedAt: iso(10),
      signature: signRevocation(receiptHash, grantor.privateKey)
    });

    assert.equal((await statusAt(iso(5))).body.status, 'active');
    assert.equal((await statusAt(iso(10))).body.status, 'revoked');
    assert.equal((await statusAt(iso(500))).body.status, 'revoked');

    assert.deepEqual(await statusAt(iso(-1)), { code: 200, body: { receiptHash, status: 'active', at: iso(-1) } });

    const unparsable = await statusAt('yesterday');
    assert.equal(unparsable.code, 400);
    assert.deepEqual(unparsable.body, { error: { code: 'INVALID_TIMESTAMP', message: 'Invalid at: yesterday' } });
  } finally {
    await api.close();
  }
});

test('receipts carrying unsigned fields are refused and never stored', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const padded = await postJson(`${api.baseUrl}/api/receipts`, { ...receipt, extraScope: ['resale'] });
    assert.equal(padded.status, 400);
    assert.deepEqual(await readJson(padded), {
      error: { code: 'INVALID_RECEIPT', message: 'Receipt from "append" is invalid (unexpected field extraScope).' }
    });

    const missing = await fetch(`${api.baseUrl}/api/receipts/${hashReceipt(receipt)}`);
    assert.equal(missing.status, 404);
    assert.equal(api.ledger.summary().anchoredEntries, 0);
  } finally {
    await api.close();
  }
});

test('a revocation recorded after expiry reports revoked', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const receiptHash = hashReceipt(receipt);
    await postJson(`${api.baseUrl}/api/receipts`, receipt);

    api.clock.seconds = 150;
    const revoked = await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, {
      signature: signRevocation(receiptHash, grantor.privateKey)
    });
    assert.equal(revoked.status, 201);

    const status = await readJson(
      await fetch(`${api.baseUrl}/api/receipts/${receiptHash}/status?at=${encodeURIComponent(iso(160))}`)
    );
    assert.equal(status.status, 'revoked');
  } finally {
    await api.close();
  }
});

test('revocations are refused for unknown receipts, foreign keys and repeats', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const receiptHash = hashReceipt(receipt);
    await postJson(`${api.baseUrl}/api/receipts`, receipt);

    const unknownHash = 'a'.repeat(64);
    const unknown = await postJson(`${api.baseUrl}/api/receipts/${unknownHash}/revocations`, {
      signature: signRevocation(unknownHash, grantor.privateKey)
    });
    assert.equal(unknown.status, 404);
    assert.deepEqual(await readJson(unknown), {
      error: { code: 'UNKNOWN_RECEIPT', message: `Cannot revoke unknown receipt ${unknownHash}.` }
    });

    const forged = await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, {
      signature: signRevocation(receiptHash, stranger.privateKey)
    });
    assert.equal(forged.status, 403);
    assert.deepEqual(await readJson(forged), {
      error: { code: 'INVALID_SIGNATURE', message: 'Revocation signature does not match the original grantor key.' }
    });

    const unsigned = await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, {});
    assert.equal(unsigned.status, 400);
    assert.deepEqual(await readJson(unsigned), { error: { code: 'BAD_REQUEST', message: 'Missing signature' } });

    const signature = signRevocation(receiptHash, grantor.privateKey);
    assert.equal((await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, { signature })).status, 201);
    const repeat = await postJson(`${api.baseUrl}/api/receipts/${receiptHash}/revocations`, { signature });
    assert.equal(repeat.status, 409);
    assert.deepEqual(await readJson(repeat), {
      error: { code: 'ALREADY_REVOKED', message: `Receipt ${receiptHash} is already revoked.` }
    });
  } finally {
    await api.close();
  }
});

test('verify reports missing scopes from repeated and comma-separated parameters', async () => {
  const api = await startApi();
  try {
    const receipt = receiptFor();
    const receiptHash = hashReceipt(receipt);
    await postJson(`${api.baseUrl}/api/receipts`, receipt);

    const response = await fetch(
      `${api.baseUrl}/api/receipts/${receiptHash}/verify?scope=analytics&scope=marketing,training&at=${encodeURIComponent(iso(50))}`
    );
    assert.equal(response.status, 200);
    assert.deepEqual(await readJson(response), {
      receiptHash,
      at: iso(50),
      status: 'active',
      valid: false,
      missingScopes: ['marketing']
    });

    const covered = await fetch(
      `${api.baseUrl}/api/receipts/${receiptHash}/verify?scope=training&at=${encodeURIComponent(iso(50))}`
    );
    assert.equal((await readJson(covered)).valid, true);
  } finally {
    await api.close();
  }
});

test('subject history and ledger views follow appended entries', async () => {
  const api = await startApi();
  try {
    const first = receiptFor();
    const firstHash = hashReceipt(first);
    await postJson(`${api.baseUrl}/api/receipts`, first);
    const second = receiptFor({ scope: ['analytics'], issuedAt: at(20), prevHash: firstHash });
    const secondHash = hashReceipt(second);
    await postJson(`${api.baseUrl}/api/receipts`, second);

    const history = await readJson(
      await fetch(`${api.baseUrl}/api/subjects/subject-1/receipts?at=${encodeURIComponent(iso(30))}`)
    );
    assert.equal(history.subjectId, 'subject-1');
    assert.equal(history.latest, secondHash);
    const receipts = history.receipts;
    assert.ok(Array.isArray(receipts));
    assert.deepEqual(
      receipts.map((entry: unknown) =>
        entry && typeof entry === 'object' && 'receiptHash' in entry ? entry.receiptHash : null
      ),
      [firstHash, secondHash]
    );

    const summary = await readJson(await fetch(`${api.baseUrl}/api/ledger`));
    assert.deepEqual(summary, {
      receiptsIssued: 2,
      revocations: 0,
      anchoredEntries: 2,
      subjects: 1,
      anchor: api.ledger.anchor()
    });

    const page = await readJson(await fetch(`${api.baseUrl}/api/ledger/entries?from=0&limit=1`));
    assert.equal(page.total, 2);
    assert.equal(page.nextFrom, 1);
    const entries = page.entries;
    assert.ok(Array.isArray(entries));
    assert.equal(entries.length, 1);

    const badRange = await fetch(`${api.baseUrl}/api/ledger/entries?limit=0`);
    assert.equal(badRange.status, 400);

    const chain = await fetch(`${api.baseUrl}/api/ledger/verify`);
    assert.equal(chain.status, 200);
    const chainBody = await readJson(chain);
    assert.equal(chainBody.ok, true);
    assert.equal(chainBody.length, 2);
  } finally {
    await api.close();
  }
});

test('write rate limit answers 429 with Retry-After', async () => {
  const api = await startApi({ rateLimit: 1 });
  try {
    assert.equal((await postJson(`${api.baseUrl}/api/receipts`, receiptFor())).status, 201);

    const limited = await postJson(`${api.baseUrl}/api/receipts`, receiptFor({ subjectId: 'subject-2' }));
    assert.equal(limited.status, 429);
    assert.equal(limited.headers.get('retry-after'), '60');
    assert.deepEqual(await readJson(limited), {
      error: { code: 'RATE_LIMITED', message: 'Too many ledger writes' },
      retryAfter: 60
    });
  } finally {
    await api.close();
  }
});

test('preflight, unknown routes and wrong methods', async () => {
  const api = await startApi();
  try {
    const preflight = await fetch(`${api.baseUrl}/api/receipts`, {
      method: 'OPTIONS',
      headers: { Origin: 'http://localhost:8080' }
    });
    assert.equal(preflight.status, 204);
    assert.equal(preflight.headers.get('access-control-allow-origin'), 'http://localhost:8080');

    const foreignOrigin = await fetch(`${api.baseUrl}/api/health`, { headers: { Origin: 'http://evil.example' } });
    assert.equal(foreignOrigin.status, 200);
    assert.equal(foreignOrigin.headers.get('access-control-allow-origin'), null);

    const unknownRoute = await fetch(`${api.baseUrl}/api/nothing`);
    assert.equal(unknownRoute.status, 404);

    const wrongMethod = await fetch(`${api.baseUrl}/api/receipts`, { method: 'GET' });
    assert.equal(wrongMethod.status, 405);
  } finally {
    await api.close();
  }
});
