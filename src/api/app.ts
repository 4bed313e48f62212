import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from '../config.js';
import { storage } from '../storage/index.js';
import { logger } from '../utils/logger.js';
import { createPairRoutes, type DeploymentSource } from './routes/pairs.js';

export function createApp(source: DeploymentSource = () => storage.load()): Express {
    const app: Express = express();

    const apiLimiter = rateLimit({
        windowMs: config.api.rateLimit.windowMs,
        max: config.api.rateLimit.maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: 'Too many requests, please try again later.',
        },
    });

    app.set('trust proxy', 1);
    app.use(cors(config.api.cors));
    app.use(express.json({ limit: '100kb' }));
    app.use(apiLimiter);

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`${req.method} ${req.path}`);
        next();
    });

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: 'healthy',
                version: '1.0.0',
                network: config.network_mode,
                initialized: storage.exists(),
                uptime: process.uptime(),
                timestamp: Date.now(),
            },
        });
    });

    app.use('/api/pairs', createPairRoutes(source));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ success: false, error: 'Not found' });
    });

    return app;
}
