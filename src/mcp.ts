#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { LintRubySignaturesSchema, runLintTool } from './core/lintTool.js';
import { RULE_NAMES } from './core/types.js';

/**
 * MCP Server for Sorbet signature checks
 * Provides one tool that reports and optionally corrects missing or detached signatures
 */

/**
 * Start the MCP server
 */
async function startServer() {
  const server = new Server(
    {
      name: 'rbsig',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool handlers
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'lint_ruby_signatures',
        description:
          'Check Ruby source for methods without Sorbet signatures and for blank lines or comments between a sig ' +
          'and its method. With autofix=true returns the corrected source with placeholder T.untyped signatures and ' +
          '`extend T::Sig` added where needed.',
        inputSchema: {
          type: 'object',
          properties: {
            text: {
              type: 'string',
              description: 'Ruby source text to check',
            },
            autofix: {
              type: 'boolean',
              description: 'Set to true to apply corrections and return the corrected source',
            },
            lineLengthLimit: {
              type: ['integer', 'null'],
              description: 'Maximum width of a one-line signature; longer ones use the multi-line form',
            },
            only: {
              type: 'array',
              items: { type: 'string', enum: [...RULE_NAMES] },
              description: 'Restrict the check to these rules',
            },
          },
          required: ['text'],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (name === 'lint_ruby_signatures') {
        const result = runLintTool(LintRubySignaturesSchema.parse(args));
        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(result, null, 2),
            },
          ],
        };
      }

      throw new Error(`Unknown tool: ${name}`);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr to avoid interfering with stdio transport
  console.error('rbsig MCP server started');
}

// Start the server
startServer().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
