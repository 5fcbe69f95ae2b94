import { createApp } from './app';
import { env } from './config/env';
import { ConfigurationError } from './utils/errors';

function buildApp() {
    try {
        return createApp();
    } catch (error) {
        // Refuse to serve decisions from a partial policy
        if (error instanceof ConfigurationError) {
            console.error(`[Config] ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

const app = buildApp();

if (env.NODE_ENV === 'production' && env.CORS_ORIGIN === '*') {
    console.warn('[Server] CORS_ORIGIN is "*" in production.');
}

app.listen(Number(env.PORT), () => {
    console.log(`Decision engine running on port ${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
    console.log(`CORS Policy: ${env.CORS_ORIGIN}`);
});
