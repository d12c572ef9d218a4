import { jest, describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import http from 'http';
import { CALLER_HEADER, LedgerServer } from '../Server.js';
import { createLedgerConfig } from '../../ledger-core/Config.js';
import { MemoryEventStore } from '../../ledger-core/__tests__/fixtures.js';

interface Reply {
    status: number;
    body: unknown;
}

// Helper for HTTP requests
function request(
    port: number,
    method: string,
    path: string,
    options: { caller?: string; body?: unknown; raw?: string } = {}
): Promise<Reply> {
    return new Promise((resolve, reject) => {
        const payload = options.raw ?? (options.body !== undefined ? JSON.stringify(options.body) : undefined);
        const headers: Record<string, string> = {};
        if (payload !== undefined) headers['content-type'] = 'application/json';
        if (options.caller !== undefined) headers[CALLER_HEADER] = options.caller;

        const req = http.request({ host: '127.0.0.1', port, path, method, headers, agent: false }, (res) => {
            let data = '';
            res.on('data', (chunk) => data += chunk);
            res.on('end', () => {
                try {
                    resolve({ status: res.statusCode ?? 0, body: JSON.parse(data) });
                } catch (e) {
                    reject(e);
                }
            });
        });
        req.on('error', reject);
        if (payload !== undefined) req.write(payload);
        req.end();
    });
}

describe('Ledger HTTP API', () => {
    const config = createLedgerConfig({ registrar: 'registrar', admin: 'kyc-admin' });
    const store = new MemoryEventStore();
    let server: LedgerServer;
    let port: number;

    const call = (method: string, path: string, options: { caller?: string; body?: unknown; raw?: string } = {}) =>
        request(port, method, path, options);

    beforeAll(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        server = new LedgerServer({ config, store });
        expect(server.start()).toBe(0);
        port = await server.listen(0);
    });

    afterAll(async () => {
        await server.close();
        jest.restoreAllMocks();
    });

    describe('Assets', () => {
        test('POST /assets tokenizes an asset', async () => {
            const reply = await call('POST', '/assets', { caller: 'registrar', body: { metadataURI: 'ipfs://x', value: 5000 } });

            expect(reply).toEqual({ status: 201, body: { assetId: 1 } });
        });

        test('a ledger rejection maps to its HTTP status', async () => {
            const reply = await call('POST', '/assets', { caller: 'mallory', body: { metadataURI: 'ipfs://y', value: 5000 } });

            expect(reply).toEqual({
                status: 403,
                body: { error: 'NotAuthorized', code: 104, message: '[Ledger:NotAuthorized] mallory is not the registrar' }
            });
        });

        test('a call without a caller is rejected by the ledger', async () => {
            const reply = await call('POST', '/assets', { body: { metadataURI: 'ipfs://y', value: 5000 } });

            expect(reply.status).toBe(400);
            expect(reply.body).toMatchObject({ error: 'InvalidAddress', code: 115 });
        });

        test('malformed requests never reach the ledger', async () => {
            const wrongType = await call('POST', '/assets', { caller: 'registrar', body: { metadataURI: 5, value: 5000 } });
            const unreadable = await call('POST', '/assets', { caller: 'registrar', raw: '{"metadataURI":' });
            const badId = await call('GET', '/assets/abc');

            for (const reply of [wrongType, unreadable, badId]) {
                expect(reply.status).toBe(400);
                expect(reply.body).toMatchObject({ error: 'InvalidInput' });
            }
        });

        test('GET /assets/:assetId', async () => {
            expect(await call('GET', '/assets/1')).toEqual({
                status: 200,
                body: {
                    id: 1,
                    owner: 'registrar',
                    metadataURI: 'ipfs://x',
                    value: 5000,
                    locked: false,
                    createdAt: 1,
                    lastPriceUpdateAt: 1,
                    accruedRevenue: 0
                }
            });
            expect(await call('GET', '/assets/9')).toEqual({
                status: 404,
                body: { error: 'NotFound', code: 101, message: '[Ledger:NotFound] Asset 9 not found' }
            });
        });
    });

    describe('Shares & Dividends', () => {
        test('transfers between approved holders', async () => {
            const approval = { approved: true, level: 1, expiresAt: 1000 };
            expect((await call('POST', '/compliance/registrar', { caller: 'kyc-admin', body: approval })).status).toBe(200);
            expect((await call('POST', '/compliance/alice', { caller: 'kyc-admin', body: approval })).status).toBe(200);

            const reply = await call('POST', '/assets/1/transfers', { caller: 'registrar', body: { recipient: 'alice', amount: 50000 } });

            expect(reply).toEqual({ status: 200, body: { ok: true } });
            expect((await call('GET', '/assets/1/balances/alice')).body).toEqual({ holder: 'alice', assetId: 1, amount: 50000 });
        });

        test('revenue is harvested pro rata', async () => {
            expect((await call('POST', '/assets/1/revenue', { caller: 'registrar', body: { amount: 10000 } })).body)
                .toEqual({ accruedRevenue: 10000 });
            expect((await call('POST', '/assets/1/harvest', { caller: 'alice' })).body).toEqual({ amount: 5000 });

            expect((await call('GET', '/cash/alice')).body).toEqual({ holder: 'alice', amount: 5000 });
            expect((await call('GET', '/assets/1/claims/alice')).body)
                .toEqual({ holder: 'alice', assetId: 1, lastClaimedAccrual: 10000, pending: 0 });
        });
    });

    describe('Governance', () => {
        test('a proposal runs from creation to finalization', async () => {
            const created = await call('POST', '/proposals', {
                caller: 'registrar',
                body: { assetId: 1, title: 'Raise rent', duration: 12, minimumThreshold: 20000 }
            });
            expect(created).toEqual({ status: 201, body: { proposalId: 1 } });

            expect((await call('POST', '/proposals/1/votes', { caller: 'alice', body: { support: true, weight: 50000 } })).status).toBe(200);

            const again = await call('POST', '/proposals/1/votes', { caller: 'alice', body: { support: true, weight: 1 } });
            expect(again.status).toBe(409);
            expect(again.body).toMatchObject({ error: 'VoteExists', code: 106 });

            const early = await call('POST', '/proposals/1/finalize', { caller: 'registrar' });
            expect(early.status).toBe(409);
            expect(early.body).toMatchObject({ error: 'VotingOpen', code: 118 });

            expect((await call('POST', '/blocks', { body: { count: 10 } })).body).toEqual({ height: 19 });
            expect((await call('POST', '/proposals/1/finalize', { caller: 'registrar' })).body).toEqual({ passed: true });

            expect((await call('GET', '/proposals/1')).body).toMatchObject({
                id: 1,
                startHeight: 7,
                endHeight: 19,
                votesFor: 50000,
                executed: true,
                passed: true,
                status: 'FINALIZED'
            });
            expect((await call('GET', '/proposals/1/votes/alice')).body)
                .toEqual({ proposalId: 1, voter: 'alice', support: true, weight: 50000, castAt: 8 });
        });
    });

    describe('Market Data', () => {
        test('an oracle reports and readers check freshness', async () => {
            expect((await call('POST', '/assets/1/oracle', { caller: 'kyc-admin', body: { oracle: 'oracle' } })).status).toBe(200);
            expect((await call('POST', '/assets/1/price', { caller: 'oracle', body: { price: 250, decimals: 2 } })).status).toBe(200);

            const price = { assetId: 1, price: 250, decimals: 2, lastUpdatedAt: 21, oracleAddress: 'oracle' };
            expect((await call('GET', '/assets/1/price')).body).toEqual(price);
            expect((await call('GET', '/assets/1/price?maxStaleness=5')).body).toEqual(price);

            const stale = await call('GET', '/assets/1/price?maxStaleness=0');
            expect(stale.status).toBe(409);
            expect(stale.body).toMatchObject({ error: 'PriceExpired', code: 108 });
        });
    });

    describe('Compliance', () => {
        test('revocation withdraws approval', async () => {
            expect((await call('DELETE', '/compliance/alice', { caller: 'kyc-admin' })).status).toBe(200);
            expect((await call('GET', '/compliance/alice')).body)
                .toEqual({ address: 'alice', approved: false, level: 1, expiresAt: 1000 });
        });
    });

    describe('Ledger State', () => {
        test('GET /audit and GET /state', async () => {
            const audit = await call('GET', '/audit');
            expect(Array.isArray(audit.body) ? audit.body.length : -1).toBe(16);

            const state = await call('GET', '/state');
            expect(state.body).toEqual({
                lifecycle: 'ACTIVE',
                version: 12,
                stateRoot: server.kernel.StateRoot,
                height: 23
            });
        });

        test('a new server restores the ledger from the event store', async () => {
            const restarted = new LedgerServer({ config, store });

            expect(restarted.start()).toBe(12);
            expect(restarted.kernel.StateRoot).toBe(server.kernel.StateRoot);
            expect(restarted.Clock.current()).toBe(23);
            expect(restarted.kernel.getCashBalance('alice')).toBe(5000);
        });
    });
});
