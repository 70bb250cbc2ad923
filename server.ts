import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { JsonObject, ToolArgs } from './types.ts';
import { createContainer, type Container } from './services/container.ts';
import { createToolExecutor, toolDeclarations } from './services/toolsService.ts';
import { settingsService } from './services/settingsService.ts';
import { loggerService } from './services/loggerService.ts';
import { redisService } from './services/redisService.ts';
import { vectorService } from './services/vectorService.ts';
import {
    LlmTransportError,
    MissingScoreError,
    NotFoundError,
    ResponseParseError,
    ValidationError,
    describeError,
} from './services/errors.ts';

export const MCP_SERVER_INFO = {
    name: 'memjudge',
    version: '0.1.0',
} as const;

const MCP_PROTOCOL_VERSION = '2024-11-05';

const JsonRpcRequestSchema = z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.string(),
    params: z.record(z.unknown()).optional(),
});

const ToolCallParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).optional(),
});

type JsonRpcId = string | number | null;

export const statusForError = (error: unknown): number => {
    if (error instanceof ValidationError) return 400;
    if (error instanceof NotFoundError) return 404;
    if (error instanceof MissingScoreError || error instanceof ResponseParseError) return 502;
    if (error instanceof LlmTransportError) return 503;
    return 500;
};

const sendError = (req: Request, res: Response, error: unknown) => {
    const status = statusForError(error);
    loggerService.error(`Error in ${req.method} ${req.url}`, { error, status });
    res.status(status).json({ error: describeError(error) });
};

const bodyOf = (req: Request): ToolArgs => {
    const body: unknown = req.body;
    return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
};

const rpcError = (id: JsonRpcId, code: number, message: string) => ({
    jsonrpc: '2.0' as const,
    id,
    error: { code, message },
});

export const createApp = (container: Container) => {
    const app = express();
    const executeTool = createToolExecutor(container);

    app.use(cors());
    app.use(express.json({ limit: '10mb' }));

    // Request Logging Middleware
    app.use((req, res, next) => {
        loggerService.info(`Request: ${req.method} ${req.url}`, {
            query: req.query,
            body: req.method === 'POST' || req.method === 'PATCH' ? req.body : undefined,
        });
        next();
    });

    // Runs a tool on behalf of a REST route; tool-level `error` results are 404s
    const runTool = async (req: Request, res: Response, name: string, args: ToolArgs, status = 200) => {
        try {
            const result = await executeTool(name, args);
            if (typeof result.error === 'string') {
                res.status(404).json(result);
                return;
            }
            res.status(status).json(result);
        } catch (e) {
            sendError(req, res, e);
        }
    };

    // Health Check Endpoint
    app.get('/api/health', async (req, res) => {
        const redis = await redisService.healthCheck();
        const vector = await vectorService.healthCheck();

        res.json({
            status: redis && vector ? 'healthy' : 'degraded',
            services: {
                redis: redis ? 'up' : 'down',
                vector: vector ? 'up' : 'down',
            },
            timestamp: new Date().toISOString(),
        });
    });

    // --- Judges ---
    app.get('/api/judges', (req, res) => runTool(req, res, 'list_judges', {}));

    app.post('/api/judges', (req, res) => runTool(req, res, 'create_judge', bodyOf(req), 201));

    app.delete('/api/judges/:name', (req, res) =>
        runTool(req, res, 'delete_judge', { judge_name: req.params.name })
    );

    app.post('/api/judges/:name/align', (req, res) =>
        runTool(req, res, 'align', { ...bodyOf(req), judge_name: req.params.name })
    );

    app.post('/api/judges/:name/judge', (req, res) =>
        runTool(req, res, 'judge', { ...bodyOf(req), judge_name: req.params.name })
    );

    app.get('/api/judges/:name/stats', (req, res) =>
        runTool(req, res, 'memory_stats', { judge_name: req.params.name })
    );

    // --- Principles ---
    app.get('/api/judges/:name/principles', (req, res) =>
        runTool(req, res, 'list_principles', { judge_name: req.params.name })
    );

    app.patch('/api/judges/:name/principles/:id', (req, res) =>
        runTool(req, res, 'update_principle', {
            new_text: bodyOf(req).text,
            judge_name: req.params.name,
            principle_id: req.params.id,
        })
    );

    app.delete('/api/judges/:name/principles/:id', (req, res) =>
        runTool(req, res, 'delete_principle', { judge_name: req.params.name, principle_id: req.params.id })
    );

    // --- Examples ---
    app.get('/api/judges/:name/examples', (req, res) => {
        const { query, limit } = req.query;
        const args: ToolArgs = { judge_name: req.params.name };
        if (typeof query === 'string' && query.trim()) args.query = query;
        if (typeof limit === 'string' && limit.trim()) args.limit = Number(limit);
        return runTool(req, res, 'list_examples', args);
    });

    app.delete('/api/judges/:name/examples/:id', (req, res) =>
        runTool(req, res, 'delete_example', { judge_name: req.params.name, example_id: req.params.id })
    );

    // --- MCP (JSON-RPC 2.0) ---
    app.post('/mcp', async (req, res) => {
        const body: unknown = req.body;
        const parsed = JsonRpcRequestSchema.safeParse(body);
        if (!parsed.success) {
            res.json(rpcError(null, -32600, `Invalid request: ${parsed.error.message}`));
            return;
        }

        const { id = null, method, params } = parsed.data;

        // Notifications carry no id and expect no response body
        if (method.startsWith('notifications/')) {
            res.status(202).end();
            return;
        }

        switch (method) {
            case 'initialize':
                res.json({
                    jsonrpc: '2.0',
                    id,
                    result: {
                        protocolVersion: MCP_PROTOCOL_VERSION,
                        serverInfo: MCP_SERVER_INFO,
                        capabilities: { tools: {} },
                    },
                });
                return;

            case 'tools/list':
                res.json({ jsonrpc: '2.0', id, result: { tools: toolDeclarations } });
                return;

            case 'tools/call': {
                const call = ToolCallParamsSchema.safeParse(params ?? {});
                if (!call.success) {
                    res.json(rpcError(id, -32602, `Invalid params: ${call.error.message}`));
                    return;
                }

                let result: JsonObject;
                let isError: boolean;
                try {
                    result = await executeTool(call.data.name, call.data.arguments ?? {});
                    isError = typeof result.error === 'string';
                } catch (e) {
                    loggerService.error(`MCP tool ${call.data.name} failed`, { error: e });
                    result = { error: describeError(e) };
                    isError = true;
                }

                res.json({
                    jsonrpc: '2.0',
                    id,
                    result: {
                        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
                        isError,
                    },
                });
                return;
            }

            default:
                res.json(rpcError(id, -32601, 'Method not found'));
        }
    });

    return app;
};

const app = createApp(createContainer());

export { app };

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const PORT = settingsService.getPort();
    app.listen(PORT, async () => {
        loggerService.info(`MemJudge server running on port ${PORT}`);

        // Startup Health Check
        loggerService.info('Performing startup health checks...');
        const redisHealth = await redisService.healthCheck();
        if (redisHealth) loggerService.info('Redis Connection: OK');
        else loggerService.error('Redis Connection: FAILED');

        const vectorHealth = await vectorService.healthCheck();
        if (vectorHealth) loggerService.info('Vector DB Connection: OK');
        else loggerService.error('Vector DB Connection: FAILED');
    });
}
