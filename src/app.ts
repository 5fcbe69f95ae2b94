import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { ZodError } from 'zod';
import { env } from './config/env';
import { AssessmentEngine } from './engine/assessment_engine';
import { createAssessmentRouter } from './routes/assessment';
import { ConfigurationError, InputValidationError } from './utils/errors';

export function createApp(engine: AssessmentEngine = AssessmentEngine.fromFiles({
    scoringConfigPath: env.SCORING_CONFIG_PATH,
    patternLibraryPath: env.PATTERN_LIBRARY_PATH,
})): express.Express {
    const app = express();

    // Behind one load balancer in deployment
    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 100,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
        validate: {
            xForwardedForHeader: false
        }
    });

    // Middleware
    app.use(helmet());
    app.use(express.json({ limit: env.JSON_BODY_LIMIT }));
    if (env.NODE_ENV !== 'test') {
        app.use(morgan('dev'));
    }
    app.use(cors({ origin: env.CORS_ORIGIN === '*' ? true : env.CORS_ORIGIN.split(',').map(o => o.trim()) }));

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            env: env.NODE_ENV,
            patternLibraryVersion: engine.library.version,
            scoringConfigVersion: engine.config.version,
            timestamp: new Date().toISOString()
        });
    });

    // Routes
    app.use('/api/assessment', limiter, createAssessmentRouter(engine));

    // Error Handling
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof InputValidationError) {
            return res.status(400).json({ error: err.message, issues: err.issues });
        }
        if (err instanceof ZodError) {
            const validation = InputValidationError.fromZod(err);
            return res.status(400).json({ error: validation.message, issues: validation.issues });
        }
        if (err instanceof ConfigurationError) {
            console.error(`[Config] ${err.message}`);
            return res.status(500).json(err.toJSON());
        }
        // Body parser failures carry their own 4xx status
        if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
            return res.status(400).json({ error: 'Malformed JSON body' });
        }
        console.error(err instanceof Error ? err.stack : err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}
