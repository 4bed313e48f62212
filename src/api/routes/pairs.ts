/**
 * Pair API Routes
 *
 * Read-only. State is reloaded from storage on every request so the API
 * follows what the CLI writes.
 */

import { Router, type Request, type Response } from 'express';
import { AmmError, PairError } from '../../errors/index.js';
import { findPair, type Deployment } from '../../storage/index.js';
import { isAddress } from '../../utils/address.js';
import { logger } from '../../utils/logger.js';
import { eventsView, pairView, pairsView, quoteView } from '../views.js';

const log = logger.child('API');

export type DeploymentSource = () => Deployment | null;

function sendError(res: Response, error: unknown): void {
    if (error instanceof AmmError) {
        const status = error.code === 'PairNotFound' ? 404 : 400;
        res.status(status).json({ success: false, error: error.message, code: error.code });
        return;
    }
    log.error('Request failed:', error);
    res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Internal error',
    });
}

function loadOrThrow(source: DeploymentSource): Deployment {
    const deployment = source();
    if (!deployment || !deployment.factory) {
        throw new PairError('NotInitialized', 'No deployment found');
    }
    return deployment;
}

function pairParam(req: Request): string {
    const address = req.params.address;
    if (!isAddress(address)) {
        throw new PairError('InvalidAddress', `Invalid pair address: ${address}`);
    }
    return address;
}

export function createPairRoutes(source: DeploymentSource): Router {
    const router = Router();

    /**
     * GET /api/pairs
     * All pairs with reserves and spot prices
     */
    router.get('/', (_req: Request, res: Response) => {
        try {
            const deployment = loadOrThrow(source);
            const pairs = deployment.factory ? pairsView(deployment.chain, deployment.factory) : [];
            res.json({ success: true, data: { count: pairs.length, pairs } });
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * GET /api/pairs/:address
     */
    router.get('/:address', (req: Request, res: Response) => {
        try {
            const deployment = loadOrThrow(source);
            const pair = findPair(deployment.chain, pairParam(req));
            if (!pair) throw new PairError('PairNotFound', `No pair at ${req.params.address}`);
            res.json({ success: true, data: pairView(deployment.chain, pair) });
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * GET /api/pairs/:address/quote?tokenIn=&amountIn=
     * Exact-input quote at current reserves
     */
    router.get('/:address/quote', (req: Request, res: Response) => {
        try {
            const deployment = loadOrThrow(source);
            const pair = findPair(deployment.chain, pairParam(req));
            if (!pair) throw new PairError('PairNotFound', `No pair at ${req.params.address}`);

            const { tokenIn, amountIn } = req.query;
            if (typeof tokenIn !== 'string' || !isAddress(tokenIn)) {
                throw new PairError('InvalidAddress', 'tokenIn must be a token address');
            }
            if (typeof amountIn !== 'string' || !/^\d+$/.test(amountIn)) {
                throw new PairError('InvalidAmount', 'amountIn must be a positive integer');
            }
            res.json({ success: true, data: quoteView(pair, tokenIn, BigInt(amountIn)) });
        } catch (error) {
            sendError(res, error);
        }
    });

    /**
     * GET /api/pairs/:address/events?from=
     */
    router.get('/:address/events', (req: Request, res: Response) => {
        try {
            const deployment = loadOrThrow(source);
            const address = pairParam(req);
            if (!findPair(deployment.chain, address)) {
                throw new PairError('PairNotFound', `No pair at ${address}`);
            }
            const from = typeof req.query.from === 'string' ? parseInt(req.query.from, 10) : undefined;
            const events = eventsView(deployment.chain, address, from !== undefined && !Number.isNaN(from) ? from : undefined);
            res.json({ success: true, data: { count: events.length, events } });
        } catch (error) {
            sendError(res, error);
        }
    });

    return router;
}
