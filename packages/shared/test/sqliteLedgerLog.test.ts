/**
 * @description: Validates SQLite ledger storage round trips, fork refusal and undecodable rows.
 * @ledger-scope: test
 * @ledger-module: SqliteLedgerLogTests
 * @ledger-risk: low - Tests cover persistence using temp databases only.
 * @ledger-ethics: low - Uses synthetic receipts only.
 */
import test from 'node:test';
import { strict as assert } from 'node:assert';
import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { createReceipt, signRevocation } from '@reciprocal/consent-core';

import { ConsentLedger } from '../src/consentLedger.js';
import { SqliteLedgerLog } from '../src/sqliteLedgerLog.js';

const SECRET = 'test-secret';
const grantor = crypto.generateKeyPairSync('ed25519');

const withTempDb = async (run: (dbPath: string) => Promise<void>) => {
  const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'consent-ledger-'));
  try {
    await run(path.join(tempRoot, 'nested', 'ledger.db'));
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
};

test('SqliteLedgerLog persists receipts and revocations across reopen', async () => {
  await withTempDb(async (dbPath) => {
    const ledger = await ConsentLedger.open({
      log: new SqliteLedgerLog({ dbPath }),
      pseudonymizationSecret: SECRET,
      now: () => new Date('2026-03-01T00:00:00.000Z')
    });

    const receipt = createReceipt(
      {
        subjectId: 'subject-1',
        grantorId: 'grantor-1',
        scope: ['training'],
        issuedAt: '2026-02-01T00:00:00.000Z',
        expiresAt: null
      },
      grantor
    );
    const receiptHash = await ledger.append(receipt);
    await ledger.revoke(receiptHash, signRevocation(receiptHash, grantor.privateKey));
    const anchor = ledger.anchor();
    await ledger.close();

    const reopened = await ConsentLedger.open({ log: new SqliteLedgerLog({ dbPath }), pseudonymizationSecret: SECRET });
    try {
      assert.equal(reopened.anchor(), anchor);
      assert.deepEqual(reopened.get(receiptHash), receipt);
      assert.equal(reopened.status(receiptHash, '2026-02-15T00:00:00.000Z'), 'active');
      assert.equal(reopened.status(receiptHash, '2026-03-01T00:00:00.000Z'), 'revoked');
      assert.equal(reopened.verifyChain().ok, true);
    } finally {
      await reopened.close();
    }

    const db = new Database(dbPath);
    try {
      const rows = db.prepare('SELECT seq, kind FROM ledger_entries ORDER BY seq').all() as Array<{ seq: number; kind: string }>;
      assert.deepEqual(rows, [
        { seq: 0, kind: 'receipt' },
        { seq: 1, kind: 'revocation' }
      ]);
    } finally {
      db.close();
    }
  });
});

test('SqliteLedgerLog refuses a second entry at the same sequence number', async () => {
  await withTempDb(async (dbPath) => {
    const ledger = await ConsentLedger.open({ log: new SqliteLedgerLog({ dbPath }), pseudonymizationSecret: SECRET });
    await ledger.append(
      createReceipt({ subjectId: 'subject-1', grantorId: 'grantor-1', scope: ['training'] }, grantor)
    );
    const [entry] = ledger.entries();
    await ledger.close();
    assert.ok(entry.kind === 'receipt');

    const log = new SqliteLedgerLog({ dbPath });
    try {
      await assert.rejects(log.append({ ...entry, entryHash: 'f'.repeat(64) }), /UNIQUE constraint failed|PRIMARY KEY/);
    } finally {
      log.close();
    }
  });
});

test('SqliteLedgerLog loads rows that no longer decode and the chain reports them', async () => {
  await withTempDb(async (dbPath) => {
    const ledger = await ConsentLedger.open({
      log: new SqliteLedgerLog({ dbPath }),
      pseudonymizationSecret: SECRET,
      now: () => new Date('2026-03-01T00:00:00.000Z')
    });
    const receiptHash = await ledger.append(
      createReceipt({ subjectId: 'subject-1', grantorId: 'grantor-1', scope: ['analytics', 'training'] }, grantor)
    );
    await ledger.revoke(receiptHash, signRevocation(receiptHash, grantor.privateKey));
    const anchor = ledger.anchor();
    await ledger.close();

    const db = new Database(dbPath);
    try {
      const row = db.prepare('SELECT record_json FROM ledger_entries WHERE seq = 0').get() as { record_json: string };
      const reordered = { ...JSON.parse(row.record_json), scope: ['training', 'analytics'] };
      db.prepare('UPDATE ledger_entries SET record_json = ? WHERE seq = 0').run(JSON.stringify(reordered));
      db.prepare('UPDATE ledger_entries SET record_json = ? WHERE seq = 1').run('{"receiptHash":');
    } finally {
      db.close();
    }

    const reopened = await ConsentLedger.open({ log: new SqliteLedgerLog({ dbPath }), pseudonymizationSecret: SECRET });
    try {
      const verification = reopened.verifyChain();
      assert.equal(verification.ok, false);
      assert.equal(verification.anchor, anchor);
      assert.equal(verification.failures.length, 2);
      assert.deepEqual(verification.failures[0], {
        seq: 0,
        reason: 'record could not be decoded: Receipt from "sqlite:ledger_entries#0" is invalid '
          + '(scope must be trimmed, sorted and de-duplicated).'
      });
      assert.equal(verification.failures[1].seq, 1);
      assert.match(verification.failures[1].reason, /^record could not be decoded: /);

      const [, revocationEntry] = reopened.entries();
      assert.ok(revocationEntry.kind === 'unreadable');
      assert.equal(revocationEntry.storedKind, 'revocation');
      assert.equal(revocationEntry.rawRecord, '{"receiptHash":');
      assert.equal(reopened.summary().receiptsIssued, 0);
    } finally {
      await reopened.close();
    }
  });
});

test('revocation rows are validated as revocations', async () => {
  await withTempDb(async (dbPath) => {
    const log = new SqliteLedgerLog({ dbPath });
    log.close();

    const db = new Database(dbPath);
    try {
      db.prepare(
        `INSERT INTO ledger_entries (seq, kind, record_hash, record_json, prev_entry_hash, entry_hash, appended_at)
         VALUES (0, 'revocation', 'x', '{"receiptHash":"nope"}', NULL, 'y', '2026-01-01T00:00:00.000Z')`
      ).run();
    } finally {
      db.close();
    }

    const reopened = new SqliteLedgerLog({ dbPath });
    try {
      const [entry] = await reopened.readAll();
      assert.ok(entry.kind === 'unreadable');
      assert.equal(
        entry.reason,
        'Revocation from "sqlite:ledger_entries#0" is invalid (receiptHash must be a receipt hash).'
      );
    } finally {
      reopened.close();
    }
  });
});
