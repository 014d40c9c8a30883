import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { EXTERNAL_DECIMALS, SHARE_DECIMALS } from '../config/constants';
import { MarketError, isMarketError } from '../core/errors';
import { MarketEngine } from '../engine/MarketEngine';
import { Side } from '../types';
import logger from '../utils/logger';
import { formatUnits, parseUnits, serializeBigInts } from '../utils/units';
import { buildMarketView, buildTraderView } from './views';

// ═══════════════════════════════════════════════════════════════════════════════
// READ-ONLY MARKET API
// ═══════════════════════════════════════════════════════════════════════════════

function parseSide(value: unknown): Side {
    if (value === 'YES' || value === 'NO') return value;
    throw new MarketError('InvalidAmount', 'side must be YES or NO');
}

function queryString(req: Request, key: string): string {
    const value = req.query[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new MarketError('InvalidAmount', `query parameter "${key}" is required`);
    }
    return value;
}

export function createDashboardApp(engine: MarketEngine): express.Express {
    const app = express();

    app.use((_req, res, next) => {
        res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
        next();
    });

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', phase: engine.getState().phase });
    });

    app.get('/market', (_req, res) => {
        res.json(buildMarketView(engine));
    });

    app.get('/positions/:trader', (req, res) => {
        res.json({ trader: req.params.trader, positions: buildTraderView(engine, req.params.trader) });
    });

    app.get('/quote/buy', (req, res) => {
        const shares = parseUnits(queryString(req, 'shares'), SHARE_DECIMALS);
        const fill = engine.quoteBuy(shares);
        res.json({
            shares: formatUnits(fill.shares, SHARE_DECIMALS),
            rawCost: formatUnits(fill.rawCost, 18),
            fee: formatUnits(fill.fee, 18),
            total: formatUnits(fill.total, 18),
            capped: fill.capped,
            reachesThreshold: fill.reachesThreshold,
        });
    });

    app.get('/quote/leverage', (req, res) => {
        const side = parseSide(req.query.side);
        const collateral = parseUnits(queryString(req, 'collateral'), EXTERNAL_DECIMALS);
        const leverage = parseUnits(queryString(req, 'leverage'), 0);
        const preview = engine.previewLeverage(side, collateral, leverage);
        res.json({
            side,
            notional: formatUnits(preview.notional, EXTERNAL_DECIMALS),
            loan: formatUnits(preview.loan, EXTERNAL_DECIMALS),
            expectedShares: formatUnits(preview.expectedShares, EXTERNAL_DECIMALS),
            averagePrice: formatUnits(preview.averagePrice, 18),
        });
    });

    app.get('/events', (req, res) => {
        const raw = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : 100;
        const limit = Number.isFinite(raw) && raw > 0 ? Math.min(raw, 1_000) : 100;
        res.json(serializeBigInts(engine.recentEvents(limit)));
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isMarketError(err)) {
            res.status(400).json({ error: err.code, message: err.message });
            return;
        }
        const reason = err instanceof Error ? err.message : String(err);
        logger.error(`[API] ${reason}`);
        res.status(500).json({ error: 'Internal', message: 'Error reading market state' });
    });

    return app;
}

export function startDashboard(engine: MarketEngine, port: number): Server {
    const app = createDashboardApp(engine);
    return app.listen(port, () => {
        logger.info(`[API] Market API listening on http://localhost:${port}`);
    });
}
