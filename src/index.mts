#!/usr/bin/env node
import { createServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { getConfig } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import { logger } from './logger.js';
import { formatZodIssues } from './schemas/policy.js';
import {
  ClassifyProfileSchema,
  ClassifyProfilesSchema,
  classifyProfileJsonSchema,
  classifyProfilesJsonSchema,
} from './schemas/verdict.js';
import { runBatch } from './services/batch.js';
import type { ProfileClassifier } from './services/classifier.js';
import { createEngine } from './services/engine.js';
import { listPolicies, summarizePolicy } from './services/policy.js';
import type { BatchResult, ClassificationOutcome } from './types.js';
import { splitProfiles } from './utils/profiles.js';

const config = getConfig();

const ClassifyProfileArgs = z.object({
  profile: z.string(),
});

const ClassifyProfilesArgs = z.object({
  profiles: z.array(z.string()).optional(),
  document: z.string().optional(),
});

function parseArgs<T>(schema: z.ZodType<T>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

function buildServer(classifier: ProfileClassifier): Server {
  const server = new Server(
    {
      name: 'profile-relevance',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'classify_profile',
        description:
          'Classify one professional profile by relevance to the enterprise Wi-Fi / network infrastructure sales motion.',
        inputSchema: {
          type: 'object',
          properties: {
            profile: {
              type: 'string',
              description: 'Free-text profile (name, title, company, responsibilities, location).',
            },
          },
          required: ['profile'],
        },
        outputSchema: classifyProfileJsonSchema,
      },
      {
        name: 'classify_profiles',
        description:
          'Classify many profiles in order. Pass an array of profiles, or one document separated by ===PROFILE===.',
        inputSchema: {
          type: 'object',
          properties: {
            profiles: {
              type: 'array',
              items: { type: 'string' },
              description: 'Profiles to classify, in order.',
            },
            document: {
              type: 'string',
              description: 'Profiles concatenated with the ===PROFILE=== separator.',
            },
          },
        },
        outputSchema: classifyProfilesJsonSchema,
      },
      {
        name: 'list_policies',
        description: 'List the built-in relevance policies and the one this server uses.',
        inputSchema: {
          type: 'object',
          properties: {},
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest, extra) => {
    try {
      switch (request.params.name) {
        case 'classify_profile': {
          const { profile } = parseArgs(ClassifyProfileArgs, request.params.arguments);
          if (!profile.trim()) {
            throw new McpError(ErrorCode.InvalidParams, 'Provide the profile text to classify.');
          }

          const outcome = await classifier.classify(profile.trim());
          const result = ClassifyProfileSchema.parse(toProfileResult(classifier, outcome));

          return {
            content: [{ type: 'text', text: formatVerdictSummary(outcome) }],
            structuredContent: result,
          };
        }
        case 'classify_profiles': {
          const args = parseArgs(ClassifyProfilesArgs, request.params.arguments);
          if (!args.profiles && args.document == null) {
            throw new McpError(ErrorCode.InvalidParams, 'Provide either "profiles" or "document".');
          }
          const profiles = args.profiles
            ? args.profiles.map((p) => p.trim()).filter(Boolean)
            : splitProfiles(args.document ?? '');

          const progressToken = request.params._meta?.progressToken;
          const batch = await runBatch(profiles, classifier, {
            concurrency: config.batch.concurrency,
            onProgress: (completed, total) => {
              if (progressToken === undefined) return;
              extra
                .sendNotification({
                  method: 'notifications/progress',
                  params: { progressToken, progress: completed, total },
                })
                .catch((err: unknown) => logger.warn({ err: describeError(err) }, 'Progress notification failed'));
            },
          });
          const result = ClassifyProfilesSchema.parse(toBatchResult(classifier, batch));

          return {
            content: [{ type: 'text', text: formatBatchSummary(batch) }],
            structuredContent: result,
          };
        }
        case 'list_policies': {
          const active = summarizePolicy(classifier.policy);
          const policies = listPolicies();
          const lines = policies.map(
            (p) => `${p.id} (v${p.version}): ${p.tiers.join(' > ')}${p.id === active.id ? ' [active]' : ''}`,
          );
          if (!policies.some((p) => p.id === active.id)) {
            lines.push(`${active.id} (v${active.version}): ${active.tiers.join(' > ')} [active, from file]`);
          }
          return {
            content: [{ type: 'text', text: lines.join('\n') }],
          };
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
      }
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }
      logger.error({ err: error }, 'Unexpected tool invocation failure');
      throw new McpError(ErrorCode.InternalError, describeError(error));
    }
  });

  return server;
}

function toProfileResult(classifier: ProfileClassifier, outcome: ClassificationOutcome) {
  return {
    policy: classifier.policy.id,
    verdict: { ...outcome.verdict },
    fallback: outcome.failure !== undefined,
    failure: outcome.failure,
  };
}

function toBatchResult(classifier: ProfileClassifier, batch: BatchResult) {
  return {
    policy: classifier.policy.id,
    total: batch.length,
    fallbacks: batch.filter((e) => e.failure).length,
    results: batch.map((e) => ({ index: e.index, verdict: { ...e.verdict }, failure: e.failure })),
  };
}

function formatVerdictSummary(outcome: ClassificationOutcome): string {
  const { verdict } = outcome;
  const lines = [`Relevance: ${verdict.tier}${outcome.failure ? ' (fallback)' : ''}`, `Why: ${verdict.rationale}`];
  if (verdict.geography) lines.push(`Geography: ${verdict.geography}`);
  if (verdict.recommendedTargetPersona) lines.push(`Target instead: ${verdict.recommendedTargetPersona}`);
  if (verdict.recommendedNextStep) lines.push(`Next step: ${verdict.recommendedNextStep}`);
  return lines.join('\n');
}

function formatBatchSummary(batch: BatchResult): string {
  if (!batch.length) return 'No profiles to classify.';
  const counts = new Map<string, number>();
  for (const entry of batch) counts.set(entry.verdict.tier, (counts.get(entry.verdict.tier) ?? 0) + 1);
  const fallbacks = batch.filter((e) => e.failure).length;
  return [
    `Classified ${batch.length} profiles`,
    ...Array.from(counts, ([tier, n]) => `${tier}: ${n}`),
    `Fallbacks: ${fallbacks}`,
  ].join('\n');
}

async function start() {
  const classifier = await createEngine(config);
  const server = buildServer(classifier);

  process.on('SIGINT', () => {
    logger.info('SIGINT received, closing server');
    server
      .close()
      .catch((err: unknown) => logger.error({ err }, 'Error while closing server'))
      .finally(() => process.exit(0));
  });

  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req, res) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isHostAllowed(req.headers.host, allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isOriginAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Profile relevance server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Profile relevance server listening');
  }
}

function isHostAllowed(hostHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !hostHeader) return true;
  const host = hostHeader.split(':')[0];
  return whitelist.has(host);
}

function isOriginAllowed(originHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !originHeader) return true;
  return whitelist.has(originHeader);
}

start().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ err: error }, `Configuration error: ${error.message}`);
  } else {
    logger.error({ err: error }, 'Failed to start profile relevance server');
  }
  process.exit(1);
});
