import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { z } from 'zod';
import { LedgerKernel } from '../ledger-core/Kernel.js';
import type { LedgerConfig } from '../ledger-core/Config.js';
import { LedgerError, LedgerErrorCode } from '../ledger-core/Errors.js';
import type { CallContext } from '../ledger-core/L0/Primitives.js';
import { ReplayEngine } from '../ledger-core/L0/Replay.js';
import { AuditLog } from '../ledger-core/L5/Audit.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { loadServiceConfig } from '../Platform/Config.js';
import { RequestError, translateError } from '../Platform/Errors.js';
import { SequencedBlockClock } from '../Platform/Ports.js';
import type { IBlockClock, IEventStore } from '../Platform/Ports.js';

export const CALLER_HEADER = 'x-ledger-caller';

// --- Request Schemas ---

const positiveId = z.coerce.number().int().positive();
const assetParams = z.object({ assetId: positiveId });
const proposalParams = z.object({ proposalId: positiveId });
const principalParam = z.string().min(1);

const tokenizeBody = z.object({ metadataURI: z.string(), value: z.number() });
const transferBody = z.object({ recipient: z.string(), amount: z.number() });
const lockBody = z.object({ locked: z.boolean() });
const amountBody = z.object({ amount: z.number() });
const oracleBody = z.object({ oracle: z.string() });
const priceBody = z.object({ price: z.number(), decimals: z.number() });
const complianceBody = z.object({ approved: z.boolean(), level: z.number(), expiresAt: z.number() });
const proposalBody = z.object({
    assetId: z.number(),
    title: z.string(),
    duration: z.number(),
    minimumThreshold: z.number()
});
const voteBody = z.object({ support: z.boolean(), weight: z.number() });
const blocksBody = z.object({ count: z.number().int().positive() });
const priceQuery = z.object({ maxStaleness: z.coerce.number().int().nonnegative().optional() });

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const detail = issue ? `${issue.path.join('.') || what}: ${issue.message}` : what;
        throw new RequestError(`Invalid ${what} (${detail})`);
    }
    return result.data;
}

export interface LedgerServerOptions {
    config: LedgerConfig;
    store?: IEventStore;
    clock?: IBlockClock;
}

/**
 * HTTP surface over a single ledger kernel. Calls are sequenced one at a
 * time: each mutating request is stamped with the clock's current height and
 * a committed call seals that block.
 */
export class LedgerServer {
    public readonly app: express.Express;
    public readonly kernel: LedgerKernel;
    private clock: IBlockClock;
    private http: HttpServer | null = null;

    constructor(options: LedgerServerOptions) {
        this.clock = options.clock ?? new SequencedBlockClock();
        this.kernel = new LedgerKernel(options.config, new AuditLog(options.store));

        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
        this.app.use(this.onError);
    }

    public get Clock(): IBlockClock { return this.clock; }

    /**
     * Restores committed history and activates the kernel.
     */
    public start(): number {
        console.log('[LedgerServer] Replaying history...');
        const restored = new ReplayEngine().replay(this.kernel.Audit, this.kernel);

        // Resume on the block after the last committed one
        const behind = this.kernel.State.lastHeight + 1 - this.clock.current();
        if (this.kernel.State.version > 0 && behind > 0) this.clock.advance(behind);

        console.log(`[LedgerServer] Kernel ${this.kernel.Lifecycle} at height ${this.clock.current()}.`);
        return restored;
    }

    public listen(port: number, host: string = '127.0.0.1'): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, host);
            server.once('error', reject);
            server.once('listening', () => {
                this.http = server;
                const address: AddressInfo | string | null = server.address();
                const bound = typeof address === 'object' && address !== null ? address.port : port;
                console.log(`[LedgerServer] Listening on ${host}:${bound}`);
                resolve(bound);
            });
        });
    }

    public close(): Promise<void> {
        const server = this.http;
        this.http = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    // --- Plumbing ---

    private route(handler: (req: Request, res: Response) => void): express.RequestHandler {
        return (req, res) => {
            try {
                handler(req, res);
            } catch (e: unknown) {
                this.fail(req, res, e);
            }
        };
    }

    private fail(req: Request, res: Response, e: unknown): void {
        const { status, body } = translateError(e);
        if (status >= 500) {
            console.error(`[LedgerServer] ${req.method} ${req.path} failed: ${body.message}`);
        }
        res.status(status).json(body);
    }

    private onError = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }
        // body-parser reports unreadable JSON here
        const message = err instanceof Error ? err.message : 'Unreadable request';
        this.fail(req, res, new RequestError(message));
    };

    /**
     * Runs one mutating call at the current height and seals the block when
     * it commits.
     */
    private call<R>(req: Request, run: (ctx: CallContext) => R): R {
        const ctx: CallContext = { caller: req.header(CALLER_HEADER) ?? '', height: this.clock.current() };
        const result = run(ctx);
        this.clock.advance(1);
        return result;
    }

    private notFound(what: string): LedgerError {
        return new LedgerError(LedgerErrorCode.NotFound, `${what} not found`);
    }

    private setupRoutes() {
        const k = this.kernel;

        this.app.use((req, _res, next) => {
            console.log(`[LedgerServer] ${req.method} ${req.url}`);
            next();
        });

        // --- Ledger State ---

        this.app.get('/state', this.route((_req, res) => {
            res.json({
                lifecycle: k.Lifecycle,
                version: k.State.version,
                stateRoot: k.StateRoot,
                height: this.clock.current()
            });
        }));

        this.app.get('/audit', this.route((_req, res) => {
            res.json(k.Audit.getHistory());
        }));

        this.app.post('/blocks', this.route((req, res) => {
            const { count } = parse(blocksBody, req.body, 'body');
            res.json({ height: this.clock.advance(count) });
        }));

        // --- Assets ---

        this.app.post('/assets', this.route((req, res) => {
            const body = parse(tokenizeBody, req.body, 'body');
            const assetId = this.call(req, ctx => k.tokenizeAsset(ctx, body.metadataURI, body.value));
            res.status(201).json({ assetId });
        }));

        this.app.get('/assets/:assetId', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const asset = k.getAssetDetails(assetId);
            if (!asset) throw this.notFound(`Asset ${assetId}`);
            res.json(asset);
        }));

        this.app.get('/assets/:assetId/balances/:holder', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const holder = parse(principalParam, req.params['holder'], 'holder');
            res.json({ holder, assetId, amount: k.getShareBalance(holder, assetId) });
        }));

        this.app.post('/assets/:assetId/transfers', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const body = parse(transferBody, req.body, 'body');
            this.call(req, ctx => k.transferShares(ctx, assetId, body.recipient, body.amount));
            res.json({ ok: true });
        }));

        this.app.post('/assets/:assetId/lock', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const { locked } = parse(lockBody, req.body, 'body');
            this.call(req, ctx => k.setAssetLock(ctx, assetId, locked));
            res.json({ ok: true });
        }));

        this.app.post('/assets/:assetId/revenue', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const { amount } = parse(amountBody, req.body, 'body');
            const accruedRevenue = this.call(req, ctx => k.depositRevenue(ctx, assetId, amount));
            res.json({ accruedRevenue });
        }));

        this.app.post('/assets/:assetId/harvest', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const amount = this.call(req, ctx => k.harvestDividends(ctx, assetId));
            res.json({ amount });
        }));

        this.app.get('/assets/:assetId/claims/:holder', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const holder = parse(principalParam, req.params['holder'], 'holder');
            res.json({
                holder,
                assetId,
                lastClaimedAccrual: k.getLastClaim(assetId, holder),
                pending: k.getPendingDividends(holder, assetId)
            });
        }));

        this.app.post('/assets/:assetId/oracle', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const { oracle } = parse(oracleBody, req.body, 'body');
            this.call(req, ctx => k.registerOracle(ctx, assetId, oracle));
            res.json({ ok: true });
        }));

        this.app.post('/assets/:assetId/price', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const body = parse(priceBody, req.body, 'body');
            this.call(req, ctx => k.setPrice(ctx, assetId, body.price, body.decimals));
            res.json({ ok: true });
        }));

        this.app.get('/assets/:assetId/price', this.route((req, res) => {
            const { assetId } = parse(assetParams, req.params, 'params');
            const { maxStaleness } = parse(priceQuery, req.query, 'query');
            if (maxStaleness !== undefined) {
                res.json(k.getValidatedPrice(assetId, maxStaleness, this.clock.current()));
                return;
            }
            const price = k.getMarketPrice(assetId);
            if (!price) throw this.notFound(`Price for asset ${assetId}`);
            res.json(price);
        }));

        // --- Compliance ---

        this.app.post('/compliance/:address', this.route((req, res) => {
            const address = parse(principalParam, req.params['address'], 'address');
            const body = parse(complianceBody, req.body, 'body');
            this.call(req, ctx => k.setComplianceRecord(ctx, address, body.approved, body.level, body.expiresAt));
            res.json({ ok: true });
        }));

        this.app.get('/compliance/:address', this.route((req, res) => {
            const address = parse(principalParam, req.params['address'], 'address');
            const record = k.getComplianceRecord(address);
            if (!record) throw this.notFound(`Compliance record for ${address}`);
            res.json(record);
        }));

        this.app.delete('/compliance/:address', this.route((req, res) => {
            const address = parse(principalParam, req.params['address'], 'address');
            this.call(req, ctx => k.revokeCompliance(ctx, address));
            res.json({ ok: true });
        }));

        // --- Governance ---

        this.app.post('/proposals', this.route((req, res) => {
            const body = parse(proposalBody, req.body, 'body');
            const proposalId = this.call(req, ctx =>
                k.initiateProposal(ctx, body.assetId, body.title, body.duration, body.minimumThreshold));
            res.status(201).json({ proposalId });
        }));

        this.app.get('/proposals/:proposalId', this.route((req, res) => {
            const { proposalId } = parse(proposalParams, req.params, 'params');
            const proposal = k.getProposalDetails(proposalId);
            if (!proposal) throw this.notFound(`Proposal ${proposalId}`);
            res.json({ ...proposal, status: k.getProposalStatus(proposalId, this.clock.current()) });
        }));

        this.app.post('/proposals/:proposalId/votes', this.route((req, res) => {
            const { proposalId } = parse(proposalParams, req.params, 'params');
            const body = parse(voteBody, req.body, 'body');
            this.call(req, ctx => k.castVote(ctx, proposalId, body.support, body.weight));
            res.json({ ok: true });
        }));

        this.app.get('/proposals/:proposalId/votes/:voter', this.route((req, res) => {
            const { proposalId } = parse(proposalParams, req.params, 'params');
            const voter = parse(principalParam, req.params['voter'], 'voter');
            const vote = k.getVoteRecord(proposalId, voter);
            if (!vote) throw this.notFound(`Vote by ${voter} on proposal ${proposalId}`);
            res.json(vote);
        }));

        this.app.post('/proposals/:proposalId/finalize', this.route((req, res) => {
            const { proposalId } = parse(proposalParams, req.params, 'params');
            const passed = this.call(req, ctx => k.finalize(ctx, proposalId));
            res.json({ passed });
        }));

        // --- Cash ---

        this.app.get('/cash/:holder', this.route((req, res) => {
            const holder = parse(principalParam, req.params['holder'], 'holder');
            res.json({ holder, amount: k.getCashBalance(holder) });
        }));
    }
}

// Start if run directly
if (require.main === module) {
    const service = loadServiceConfig();
    const store = new SQLiteEventStore(service.dbPath);
    const server = new LedgerServer({ config: service.ledger, store });
    server.start();
    server.listen(service.port, '0.0.0.0').catch((e: unknown) => {
        console.error('[LedgerServer] Failed to listen:', e);
        store.close();
        process.exitCode = 1;
    });
}
