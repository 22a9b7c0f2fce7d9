import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { LedgerKernel } from '../kernel-core/Kernel.js';
import { ErrorCode, LedgerError, isInputError } from '../kernel-core/Errors.js';
import type { InputErrorCode } from '../kernel-core/Errors.js';
import { SQLiteLedgerStore } from '../infrastructure/persistence/SQLiteLedgerStore.js';
import { loadConfig } from '../config.js';
import {
    CALLER_HEADER, asBody, parseDeliveryId, parseUnsignedParam, readRole, readString, readUnsigned, requireCaller
} from './Requests.js';

// Input errors all answer 400
const STATUS_BY_CODE: Record<Exclude<ErrorCode, InputErrorCode>, number> = {
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.ALREADY_INITIALIZED]: 409,
    [ErrorCode.ALREADY_COMPLETED]: 409,
    [ErrorCode.LOG_LIMIT_EXCEEDED]: 422,
    [ErrorCode.ORACLE_CAPACITY_EXCEEDED]: 422,
    [ErrorCode.ROLE_CAPACITY_EXCEEDED]: 422,
    [ErrorCode.PAUSED]: 503
};

export function httpStatusFor(error: LedgerError): number {
    // A request without any caller is unauthenticated rather than unauthorized.
    const { code } = error;
    if (code === ErrorCode.UNAUTHORIZED && error.metadata.reason === 'missing-caller') return 401;
    if (isInputError(code)) return 400;
    return STATUS_BY_CODE[code];
}

/**
 * Transport failures raised by express and body-parser carry a 4xx `status`.
 */
function clientErrorStatus(err: unknown): number | null {
    if (typeof err !== 'object' || err === null || !('status' in err)) return null;
    const { status } = err;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export class LedgerServer {
    private app: express.Express;
    private server: Server | null = null;

    constructor(private kernel: LedgerKernel) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());

        this.setupRoutes();
        this.app.use(this.handleError);
    }

    public get App() { return this.app; }

    public start(port: number, host: string = '127.0.0.1'): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, host);
            server.once('error', reject);
            server.once('listening', () => {
                const address = server.address();
                if (address === null || typeof address === 'string') {
                    reject(new Error(`LedgerServer Error: Unexpected listen address ${String(address)}`));
                    return;
                }
                this.server = server;
                console.log(`[LedgerServer] Listening on ${address.address}:${address.port}`);
                resolve(address);
            });
        });
    }

    public stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private setupRoutes() {
        const { ledger, roles, oracles, admin, queries, audit } = this.kernel;
        const caller = (req: Request) => requireCaller(req.header(CALLER_HEADER));

        // --- Deliveries ---
        this.app.post('/deliveries', (req, res) => {
            const body = asBody(req.body);
            const deliveryId = readUnsigned(body, 'deliveryId');
            ledger.initializeDelivery(caller(req), {
                deliveryId,
                operator: readString(body, 'operator'),
                supplier: readString(body, 'supplier'),
                recipient: readString(body, 'recipient'),
                expectedArrival: readUnsigned(body, 'expectedArrival'),
                payloadFingerprint: readString(body, 'payloadFingerprint')
            });
            res.status(201).json({ deliveryId });
        });

        this.app.get('/deliveries/:id', (req, res) => {
            const record = queries.getDeliveryDetails(parseDeliveryId(req.params.id));
            res.json({ delivery: record });
        });

        this.app.post('/deliveries/:id/events', (req, res) => {
            const body = asBody(req.body);
            const sequence = ledger.logEvent(caller(req), parseDeliveryId(req.params.id), {
                latitude: readString(body, 'latitude'),
                longitude: readString(body, 'longitude'),
                altitude: readUnsigned(body, 'altitude'),
                status: readString(body, 'status'),
                note: readString(body, 'note')
            });
            res.status(201).json({ sequence });
        });

        this.app.get('/deliveries/:id/events', (req, res) => {
            res.json({ events: queries.getEventHistory(parseDeliveryId(req.params.id)) });
        });

        this.app.get('/deliveries/:id/events/:sequence', (req, res) => {
            const entry = queries.getEventLog(parseDeliveryId(req.params.id), parseUnsignedParam('sequence', req.params.sequence));
            res.json({ event: entry });
        });

        this.app.post('/deliveries/:id/failure', (req, res) => {
            const body = asBody(req.body);
            ledger.logFailure(caller(req), parseDeliveryId(req.params.id), readString(body, 'reason'));
            res.json({ failed: true });
        });

        this.app.get('/deliveries/:id/sequence', (req, res) => {
            res.json({ sequence: queries.getLatestSequence(parseDeliveryId(req.params.id)) });
        });

        this.app.get('/deliveries/:id/completed', (req, res) => {
            res.json({ completed: queries.isDeliveryCompleted(parseDeliveryId(req.params.id)) });
        });

        // --- Roles ---
        this.app.post('/deliveries/:id/roles', (req, res) => {
            const body = asBody(req.body);
            const user = readString(body, 'user');
            const role = readRole(readString(body, 'role'));
            const deliveryId = parseDeliveryId(req.params.id);
            roles.assignRole(caller(req), user, deliveryId, role);
            res.status(201).json({ roles: queries.getRoles(user, deliveryId) });
        });

        this.app.delete('/deliveries/:id/roles/:user/:role', (req, res) => {
            const deliveryId = parseDeliveryId(req.params.id);
            roles.removeRole(caller(req), req.params.user, deliveryId, readRole(req.params.role));
            res.json({ roles: queries.getRoles(req.params.user, deliveryId) });
        });

        this.app.get('/deliveries/:id/roles/:user', (req, res) => {
            res.json({ roles: queries.getRoles(req.params.user, parseDeliveryId(req.params.id)) });
        });

        this.app.get('/deliveries/:id/roles/:user/:role', (req, res) => {
            const granted = queries.hasRole(req.params.user, parseDeliveryId(req.params.id), readRole(req.params.role));
            res.json({ granted });
        });

        // --- Oracles ---
        this.app.get('/oracles', (_req, res) => {
            res.json({ oracles: queries.getOracles() });
        });

        this.app.post('/oracles', (req, res) => {
            oracles.addOracle(caller(req), readString(asBody(req.body), 'identity'));
            res.status(201).json({ oracles: queries.getOracles() });
        });

        this.app.delete('/oracles/:identity', (req, res) => {
            oracles.removeOracle(caller(req), req.params.identity);
            res.json({ oracles: queries.getOracles() });
        });

        // --- Admin ---
        this.app.get('/admin', (_req, res) => {
            res.json({ owner: queries.getContractOwner(), paused: queries.getContractPaused() });
        });

        this.app.post('/admin/pause', (req, res) => {
            admin.pause(caller(req));
            res.json({ paused: true });
        });

        this.app.post('/admin/unpause', (req, res) => {
            admin.unpause(caller(req));
            res.json({ paused: false });
        });

        // --- Audit Query ---
        this.app.get('/audit', (_req, res) => {
            res.json({ valid: audit.verifyChain(), history: audit.getHistory() });
        });
    }

    private handleError = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof LedgerError) {
            res.status(httpStatusFor(err)).json({ error: { code: err.code, message: err.detail } });
            return;
        }
        if (err instanceof SyntaxError) {
            // body-parser rejects unparseable JSON with a SyntaxError
            res.status(400).json({ error: { code: ErrorCode.MALFORMED_FIELD, message: 'Request body is not valid JSON' } });
            return;
        }
        const status = clientErrorStatus(err);
        if (status !== null) {
            res.status(status).json({ error: { code: ErrorCode.MALFORMED_FIELD, message: 'Request could not be read' } });
            return;
        }
        console.error(`[LedgerServer] ${req.method} ${req.url} failed:`, err);
        res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal error' } });
    };
}

// Start if run directly
if (require.main === module) {
    const config = loadConfig();
    const store = new SQLiteLedgerStore(config.storage.path);
    const kernel = new LedgerKernel({
        owner: config.ledger.owner,
        store,
        genesisHeight: config.ledger.genesisHeight,
        quiet: config.ledger.quiet
    });
    const server = new LedgerServer(kernel);

    const shutdown = () => {
        server.stop()
            .then(() => store.close())
            .catch(e => console.error('[LedgerServer] Shutdown failed:', e))
            .finally(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.start(config.server.port, config.server.host).catch(e => {
        console.error('[LedgerServer] Failed to start:', e);
        process.exit(1);
    });
}
