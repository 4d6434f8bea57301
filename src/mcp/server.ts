/**
 * xcsync MCP Server
 *
 * Exposes source registration and integrity checks via the Model Context Protocol (MCP).
 * Use with stdio transport for IDE integration.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { syncSources, verifyProject } from '../core/sync.js';
import {
  AnchorNotFoundError,
  ConfigError,
  MalformedDescriptorError,
  ProjectNotFoundError,
  ReferentialIntegrityError,
} from '../core/errors.js';
import { IssueKind, SkipReason } from '../types/index.js';
import type { SyncResult } from '../types/index.js';
import packageJson from '../../package.json';

const syncInputSchema = {
  path: z.string().describe('Path to project.pbxproj, .xcodeproj, .xcworkspace, or a directory containing one'),
  files: z.array(z.string()).optional().describe('Files to register. If omitted, the source root is scanned.'),
  target: z.string().optional().describe('Native target to compile into. Defaults to the main app target.'),
  sourceRoot: z.string().optional().describe('Directory to scan for sources'),
  createGroups: z.boolean().optional().describe('Create groups for folders without one (default true)'),
};

const syncOutputSchema = {
  added: z.array(z.object({ name: z.string(), path: z.string(), group: z.string() })),
  skipped: z.array(z.object({
    name: z.string(),
    path: z.string(),
    reason: z.nativeEnum(SkipReason),
  })),
  createdGroups: z.array(z.string()),
  written: z.boolean(),
  summary: z.object({
    pbxprojPath: z.string(),
    target: z.string().optional(),
    operations: z.number(),
    durationMs: z.number(),
  }),
};

function toStructured(result: SyncResult) {
  return {
    added: result.added,
    skipped: result.skipped,
    createdGroups: result.createdGroups,
    written: result.written,
    summary: {
      pbxprojPath: result.pbxprojPath,
      target: result.targetName,
      operations: result.operations,
      durationMs: result.duration,
    },
  };
}

/**
 * Known failures become tool errors; anything else propagates
 */
function toolError(error: unknown) {
  if (
    error instanceof ProjectNotFoundError ||
    error instanceof MalformedDescriptorError ||
    error instanceof AnchorNotFoundError ||
    error instanceof ReferentialIntegrityError ||
    error instanceof ConfigError
  ) {
    return {
      content: [
        {
          type: 'text' as const,
          text: `${error.name}: ${error.message}\n\nThe project file was not modified.`,
        },
      ],
      isError: true,
    };
  }
  throw error;
}

/**
 * Create and configure the MCP server
 */
export function createMcpServer(): McpServer {
  const server = new McpServer(
    {
      name: 'xcsync',
      version: packageJson.version,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: 'xcsync registers Swift and Objective-C sources in Xcode projects. ' +
        'Use xcsync_plan to preview which files are missing from a project, ' +
        'xcsync_add to register them, and xcsync_verify to check the project for dangling references.',
    }
  );

  // Tool: xcsync_plan
  // Dry run: report what would be added
  server.registerTool(
    'xcsync_plan',
    {
      description: 'Preview which source files are missing from an Xcode project and which groups would be created. ' +
        'Never writes.',
      inputSchema: syncInputSchema,
      outputSchema: syncOutputSchema,
    },
    async ({ path, files, target, sourceRoot, createGroups }) => {
      try {
        const result = await syncSources({ path, files, target, sourceRoot, createGroups, dryRun: true });
        const structuredContent = toStructured(result);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
          structuredContent,
        };
      } catch (error) {
        return toolError(error);
      }
    }
  );

  // Tool: xcsync_add
  // Register missing files and write the project atomically
  server.registerTool(
    'xcsync_add',
    {
      description: 'Register source files that exist on disk but are missing from an Xcode project. ' +
        'Adds file references, build files and groups, then replaces project.pbxproj atomically. ' +
        'Running it twice adds nothing the second time.',
      inputSchema: syncInputSchema,
      outputSchema: syncOutputSchema,
    },
    async ({ path, files, target, sourceRoot, createGroups }) => {
      try {
        const result = await syncSources({ path, files, target, sourceRoot, createGroups });
        const structuredContent = toStructured(result);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
          structuredContent,
        };
      } catch (error) {
        return toolError(error);
      }
    }
  );

  // Tool: xcsync_verify
  server.registerTool(
    'xcsync_verify',
    {
      description: 'Check an Xcode project for build files, group children and build phase entries ' +
        'that reference missing records, and for files compiled twice.',
      inputSchema: {
        path: z.string().describe('Path to project.pbxproj, .xcodeproj, .xcworkspace, or a directory containing one'),
      },
      outputSchema: {
        issues: z.array(z.object({
          kind: z.nativeEnum(IssueKind),
          recordId: z.string(),
          referenceId: z.string(),
          message: z.string(),
        })),
        counts: z.object({
          fileReferences: z.number(),
          buildFiles: z.number(),
          groups: z.number(),
          buildPhases: z.number(),
        }),
      },
    },
    async ({ path }) => {
      try {
        const result = await verifyProject(path);
        const structuredContent = { issues: result.issues, counts: result.counts };
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
          structuredContent,
        };
      } catch (error) {
        return toolError(error);
      }
    }
  );

  return server;
}

/**
 * Start the MCP server with stdio transport
 */
export async function startMcpServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);

  // Log to stderr so it doesn't interfere with MCP protocol on stdout
  console.error(`xcsync MCP server v${packageJson.version} running on stdio`);
}
