import { Pool } from 'pg';
import { RequestAuthenticator } from './auth/authenticator';
import { BatchOrchestrator } from './batch/batch-orchestrator';
import { ConsoleBatchEventSink } from './batch/events';
import { PostgresCheckpointStore } from './checkpoints/checkpoint-store';
import { parseBulkAvailabilityEnv } from './env';
import {
    CachedItemAvailabilityStore,
    PostgresItemAvailabilityStore,
} from './items/item-store';
import { createBulkAvailabilityServer } from './server';

export * from './constants';

async function main(): Promise<void> {
    const env = parseBulkAvailabilityEnv(process.env);
    const statePool = new Pool({
        allowExitOnIdle: false,
        connectionString: env.pgUrl,
        idleTimeoutMillis: 30000,
        max: 10,
    });
    const itemStore = new CachedItemAvailabilityStore(
        new PostgresItemAvailabilityStore(env.pgUrl, {
            pool: statePool,
            schemaName: env.pgSchema,
        }),
        {
            ttlSeconds: env.itemCacheTtlSeconds,
        },
    );
    const checkpointStore = new PostgresCheckpointStore(env.pgUrl, {
        pool: statePool,
        schemaName: env.pgSchema,
    });
    const orchestrator = new BatchOrchestrator(
        itemStore,
        checkpointStore,
        {
            chunkSize: env.chunkSize,
            maxItems: env.maxItems,
            timeBudgetSeconds: env.timeBudgetSeconds,
            safetyMarginSeconds: env.safetyMarginSeconds,
            resumeTtlSeconds: env.resumeTtlSeconds,
            progressTtlSeconds: env.progressTtlSeconds,
            retentionSeconds: env.retentionSeconds,
            previewSampleSize: env.previewSampleSize,
            previewWindowDays: env.previewWindowDays,
        },
        undefined,
        new ConsoleBatchEventSink(),
    );
    const server = createBulkAvailabilityServer({
        authenticator: new RequestAuthenticator(env.apiToken),
        orchestrator,
    }, {
        maxJsonBodyBytes: env.maxJsonBodyBytes,
    });

    await new Promise<void>((resolve) => {
        server.listen(env.port, '0.0.0.0', () => {
            resolve();
        });
    });

    const purged = await checkpointStore.purgeExpired();

    console.log('bulk-availability listening', {
        chunk_size: env.chunkSize,
        max_items: env.maxItems,
        time_budget_seconds: env.timeBudgetSeconds,
        safety_margin_seconds: env.safetyMarginSeconds,
        resume_ttl_seconds: env.resumeTtlSeconds,
        progress_ttl_seconds: env.progressTtlSeconds,
        retention_seconds: env.retentionSeconds,
        item_cache_ttl_seconds: env.itemCacheTtlSeconds,
        purged_checkpoints: purged,
        max_json_body_bytes: env.maxJsonBodyBytes,
        pg_schema: env.pgSchema,
        pg_url_configured: env.pgUrl.length > 0,
        port: env.port,
    });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('bulk-availability failed to start', error);
        process.exitCode = 1;
    });
}
