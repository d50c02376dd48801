import dotenv from 'dotenv';
import { logger, validateEnvironment, toEngineConfig } from '@token-engine/shared';
import { createTokenEngine } from './di/bootstrap.js';
import { startAPI } from './api/server.js';

// Load environment variables
dotenv.config();

/**
 * Token Engine Entry Point
 * One process, one supervised browser, one HTTP API
 */
async function main(): Promise<void> {
    logger.info('🔍 Starting environment validation...');
    const env = validateEnvironment();

    logger.info('🚀 Starting Token Engine...');
    const engine = createTokenEngine(toEngineConfig(env));

    if (env.WARM_BROWSER_ON_START && env.LOCAL_SOLVING_ENABLED) {
        try {
            await engine.warmUp();
            logger.info('✅ Browser warmed up');
        } catch (error) {
            // The next request retries the launch
            logger.error({ err: error }, '⚠️ Browser warm-up failed, continuing without a ready browser');
        }
    }

    startAPI(engine, { host: env.HOST, port: env.PORT, corsOrigin: env.CORS_ORIGIN });
    logger.info('✅ Token Engine started successfully');
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to start token engine');
    process.exit(1);
});
