#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import express, { type Response } from 'express';

import { allowedOrigins, env } from './config/env.js';
import type { AuthenticatedRequest } from './middleware/auth.js';
import { BillingService } from './services/billing-service.js';
import { getSupabase } from './services/supabase.js';
import { SupabaseBillingStore } from './services/supabase-service.js';
import { TOOLS } from './tools/definitions.js';
import { toolCallBodySchema } from './tools/index.js';
import { createToolHandler, type ShopServices } from './tools/handler.js';
import { toErrorResult } from './utils/errors.js';

const SERVER_NAME = 'gst-invoice-mcp';
const SERVER_VERSION = '1.0.0';

function forUser(userId: string): ShopServices {
  const store = new SupabaseBillingStore(getSupabase(), userId);
  return {
    billing: new BillingService({ configuration: store, rates: store }),
    invoices: store,
  };
}

const handleToolCall = createToolHandler({ forUser });

// Create and configure the MCP server
const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    const result = await handleToolCall(name, args || {});
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    console.error(`[Billing] Tool ${name} failed:`, error instanceof Error ? error.message : error);
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(toErrorResult(error)),
        },
      ],
      isError: true,
    };
  }
});

// Determine transport mode
const isHTTPMode = env.MCP_HTTP_MODE === 'true' || process.argv.includes('--http');

async function startHTTP() {
  const { authMiddleware, createCorsMiddleware, createRateLimitMiddleware } = await import('./middleware/auth.js');

  const app = express();

  app.use(express.json());
  app.use(createCorsMiddleware(allowedOrigins()));

  // Health check endpoint (no auth required)
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', service: SERVER_NAME, version: SERVER_VERSION, tools_count: TOOLS.length });
  });

  // List tools endpoint (no auth required, read-only)
  app.get('/mcp/tools', (req, res) => {
    res.json({ tools: TOOLS });
  });

  // Tool call endpoint - requires auth; limits are counted per authenticated user
  app.post(
    '/mcp/tools/call',
    authMiddleware,
    createRateLimitMiddleware({ limit: env.RATE_LIMIT_PER_MINUTE }),
    async (req: AuthenticatedRequest, res: Response) => {
      const parsed = toolCallBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json(toErrorResult(parsed.error));
      }

      const { name, arguments: args = {} } = parsed.data;
      const authenticatedUserId = req.userId;

      // Security: Ensure user can only access their own data
      if (typeof args.user_id === 'string' && args.user_id !== authenticatedUserId) {
        return res.status(403).json({
          error: 'Forbidden',
          message: 'You can only access your own data',
        });
      }

      try {
        const result = await handleToolCall(name, { ...args, user_id: authenticatedUserId });
        res.json({ result });
      } catch (error) {
        console.error(`[HTTP] Tool ${name} failed:`, error instanceof Error ? error.message : error);
        res.status(400).json(toErrorResult(error));
      }
    }
  );

  app.listen(env.PORT, () => {
    console.error(`[HTTP] ${SERVER_NAME} running on port ${env.PORT}`);
    console.error(`[HTTP] Health check: http://localhost:${env.PORT}/health`);
    console.error(`[HTTP] Tools: http://localhost:${env.PORT}/mcp/tools`);
  });
}

async function startStdio() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} running on stdio`);
}

(isHTTPMode ? startHTTP() : startStdio()).catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
