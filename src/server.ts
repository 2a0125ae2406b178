import {
    createServer,
    IncomingMessage,
    Server,
    ServerResponse,
} from 'node:http';
import { URL } from 'node:url';
import { RequestAuthenticator } from './auth/authenticator';
import { BatchOrchestrator } from './batch/batch-orchestrator';
import { BatchFailure } from './batch/models';

export interface BulkAvailabilityDependencies {
    authenticator: RequestAuthenticator;
    orchestrator: BatchOrchestrator;
}

export interface BulkAvailabilityServerOptions {
    maxJsonBodyBytes?: number;
}

const DEFAULT_MAX_JSON_BODY_BYTES = 1_048_576;

class RequestBodyTooLargeError extends Error {
    constructor(public readonly maxBytes: number) {
        super(`request body exceeded max of ${maxBytes} bytes`);
    }
}

async function readJsonBody(
    request: IncomingMessage,
    maxJsonBodyBytes: number,
): Promise<Record<string, unknown>> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of request) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        totalBytes += buffer.length;

        if (totalBytes > maxJsonBodyBytes) {
            throw new RequestBodyTooLargeError(maxJsonBodyBytes);
        }

        chunks.push(buffer);
    }

    if (chunks.length === 0) {
        return {};
    }

    const bodyText = Buffer.concat(chunks).toString('utf8');

    if (!bodyText.trim()) {
        return {};
    }

    const parsed: unknown = JSON.parse(bodyText);

    if (!isJsonObject(parsed)) {
        throw new Error('request body must be a JSON object');
    }

    return parsed;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sendJson(
    response: ServerResponse,
    statusCode: number,
    payload: Record<string, unknown>,
): void {
    response.statusCode = statusCode;
    response.setHeader('content-type', 'application/json');
    response.end(JSON.stringify(payload));
}

function sendFailure(response: ServerResponse, failure: BatchFailure): void {
    sendJson(response, failure.statusCode, {
        error: failure.error,
        message: failure.message,
        operation_id: failure.operation_id,
        processed_count: failure.processed_count,
        violation: failure.violation,
    });
}

function asBatchActionPath(
    pathname: string,
    action: 'resume' | 'cancel' | 'progress',
): string | null {
    const match = pathname.match(/^\/v1\/batches\/([^/]+)\/([a-z]+)$/);

    if (!match || match[2] !== action) {
        return null;
    }

    return decodeURIComponent(match[1]);
}

export function createBulkAvailabilityServer(
    deps: BulkAvailabilityDependencies,
    options?: BulkAvailabilityServerOptions,
): Server {
    const maxJsonBodyBytes = options?.maxJsonBodyBytes ||
        DEFAULT_MAX_JSON_BODY_BYTES;

    return createServer(async (request, response) => {
        try {
            const method = request.method || 'GET';
            const parsedUrl = new URL(request.url || '/', 'http://localhost');
            const pathname = parsedUrl.pathname;

            if (method === 'GET' && pathname === '/v1/health') {
                sendJson(response, 200, {
                    ok: true,
                });

                return;
            }

            const authResult = deps.authenticator.authenticate(
                request.headers.authorization,
            );

            if (!authResult.success) {
                sendJson(response, 401, {
                    error: 'unauthorized',
                    reason_code: authResult.reasonCode,
                });

                return;
            }

            if (method === 'GET' && pathname === '/v1/batches/limits') {
                sendJson(response, 200, {
                    limits: deps.orchestrator.getLimits(),
                });

                return;
            }

            if (method === 'POST' && pathname === '/v1/batches') {
                const body = await readJsonBody(request, maxJsonBodyBytes);
                const result = await deps.orchestrator.start(body);

                if (!result.success) {
                    sendFailure(response, result);

                    return;
                }

                sendJson(response, result.statusCode, {
                    batch: result.result,
                });

                return;
            }

            if (method === 'POST' && pathname === '/v1/previews') {
                const body = await readJsonBody(request, maxJsonBodyBytes);
                const result = await deps.orchestrator.preview(body);

                if (!result.success) {
                    sendFailure(response, result);

                    return;
                }

                sendJson(response, result.statusCode, {
                    preview: result.result,
                });

                return;
            }

            if (method === 'POST') {
                const resumeId = asBatchActionPath(pathname, 'resume');

                if (resumeId) {
                    const result = await deps.orchestrator.resume(resumeId);

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, result.statusCode, {
                        batch: result.result,
                    });

                    return;
                }

                const cancelId = asBatchActionPath(pathname, 'cancel');

                if (cancelId) {
                    const result = await deps.orchestrator.cancel(cancelId);

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, result.statusCode, {
                        cancellation: result.result,
                    });

                    return;
                }
            }

            if (method === 'GET') {
                const progressId = asBatchActionPath(pathname, 'progress');

                if (progressId) {
                    const result = await deps.orchestrator.getProgress(
                        progressId,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, result.statusCode, {
                        progress: result.result,
                    });

                    return;
                }
            }

            sendJson(response, 404, {
                error: 'not_found',
            });
        } catch (error: unknown) {
            if (error instanceof RequestBodyTooLargeError) {
                sendJson(response, 413, {
                    error: 'payload_too_large',
                    reason_code: 'request_body_too_large',
                    message: error.message,
                });

                return;
            }

            const message = error instanceof Error
                ? error.message
                : 'unknown_error';

            sendJson(response, 400, {
                error: 'bad_request',
                message,
            });
        }
    });
}
