// ============================================================================
// API Server - Fastify entry point
// ============================================================================

import 'dotenv/config';
import { buildApp, createAppDeps } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const fastify = await buildApp(createAppDeps(config));

// ============================================================================
// Start Server
// ============================================================================

const { port, host } = config.server;

try {
    await fastify.listen({ port, host });
    console.log(`Server running at http://${host}:${port}`);
} catch (err) {
    fastify.log.error(err);
    process.exit(1);
}

process.on('SIGINT', () => {
    fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
            console.error('Failed to close server:', err);
            process.exit(1);
        },
    );
});
