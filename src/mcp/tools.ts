import { z } from 'zod';
import type { DownloadService } from '../service/download-service.js';
import type { TaskSnapshot } from '../models/task.js';
import { isDownloadError } from '../errors/index.js';
import { formatSpeed } from '../utils/format.js';
import { logger, describeError } from '../utils/logger.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required: string[];
  };
};

const idProperty = {
  id: {
    type: 'string',
    description: 'Task id returned by create_download or list_downloads',
  },
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'create_download',
    description: 'Register a new HTTP(S) download task. The transfer does not begin unless start is true.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'http:// or https:// URL of the file' },
        name: { type: 'string', description: 'Display name (default: file name from the URL)' },
        path: { type: 'string', description: 'Destination file path (default: download directory + file name)' },
        start: { type: 'boolean', description: 'Start the transfer immediately (default: false)', default: false },
      },
      required: ['url'],
    },
  },
  {
    name: 'start_download',
    description: 'Start a pending or paused download task',
    inputSchema: { type: 'object', properties: idProperty, required: ['id'] },
  },
  {
    name: 'pause_download',
    description: 'Pause a running download, keeping the partial file for a later resume',
    inputSchema: { type: 'object', properties: idProperty, required: ['id'] },
  },
  {
    name: 'resume_download',
    description: 'Resume a paused download from the bytes already on disk',
    inputSchema: { type: 'object', properties: idProperty, required: ['id'] },
  },
  {
    name: 'cancel_download',
    description: 'Cancel a download. The file on disk is kept.',
    inputSchema: { type: 'object', properties: idProperty, required: ['id'] },
  },
  {
    name: 'retry_download',
    description: 'Move a failed download back to pending, optionally starting it again',
    inputSchema: {
      type: 'object',
      properties: {
        ...idProperty,
        start: { type: 'boolean', description: 'Start the transfer after queuing it (default: true)', default: true },
      },
      required: ['id'],
    },
  },
  {
    name: 'delete_download',
    description: 'Remove a download task, cancelling it first when it is running',
    inputSchema: {
      type: 'object',
      properties: {
        ...idProperty,
        deleteFile: { type: 'boolean', description: 'Also delete the destination file (default: false)', default: false },
      },
      required: ['id'],
    },
  },
  {
    name: 'list_downloads',
    description: 'List download tasks with their status and progress',
    inputSchema: {
      type: 'object',
      properties: {
        activeOnly: { type: 'boolean', description: 'Only pending and downloading tasks (default: false)', default: false },
      },
      required: [],
    },
  },
  {
    name: 'get_download',
    description: 'Show one download task in detail, including its current speed',
    inputSchema: { type: 'object', properties: idProperty, required: ['id'] },
  },
];

const IdArgs = z.object({ id: z.string().min(1) });

const CreateArgs = z.object({
  url: z.string(),
  name: z.string().optional(),
  path: z.string().optional(),
  start: z.boolean().default(false),
});

const RetryArgs = IdArgs.extend({ start: z.boolean().default(true) });
const DeleteArgs = IdArgs.extend({ deleteFile: z.boolean().default(false) });
const ListArgs = z.object({ activeOnly: z.boolean().default(false) });

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}

function failure(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }], isError: true };
}

export function describeTask(task: TaskSnapshot): string {
  const lines = [
    `**${task.name}** (${task.id})`,
    `   Status: ${task.statusText}`,
    `   Progress: ${task.progress}% (${task.downloadedText} / ${task.totalText})`,
    `   URL: ${task.url}`,
    `   Path: ${task.path}`,
  ];
  if (task.error) {
    lines.push(`   Error: ${task.error}${task.canRetry ? ' (retryable)' : ''}`);
  }
  return lines.join('\n');
}

/**
 * Tool dispatcher for the MCP server. Argument and DownloadError failures
 * become error results; anything else is rethrown to the transport.
 */
export class DownloadTools {
  private readonly service: DownloadService;

  constructor(service: DownloadService) {
    this.service = service;
  }

  async call(name: string, args: unknown): Promise<ToolResult> {
    logger().info('Tool called', { name });
    try {
      return await this.dispatch(name, args ?? {});
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
        return failure(`Invalid arguments for ${name}: ${issues.join('; ')}`);
      }
      if (isDownloadError(error)) {
        logger().warn('Tool call rejected', { name, code: error.code, error: error.message });
        return failure(`${error.code}: ${error.message}`);
      }
      logger().error('Tool call failed', { name, error: describeError(error) });
      throw error;
    }
  }

  private async dispatch(name: string, args: unknown): Promise<ToolResult> {
    switch (name) {
      case 'create_download': {
        const { url, name: taskName, path, start } = CreateArgs.parse(args);
        const task = await this.service.createDownloadTask(url, taskName, path);
        if (start) {
          this.service.startDownload(task.id);
        }
        return text(`Created download task:\n${describeTask(this.service.getTaskById(task.id))}`);
      }

      case 'start_download': {
        const { id } = IdArgs.parse(args);
        this.service.startDownload(id);
        return text(`Download ${id}: ${this.service.getTaskById(id).statusText}`);
      }

      case 'pause_download': {
        const { id } = IdArgs.parse(args);
        await this.service.pauseDownload(id);
        return text(`Download ${id}: ${this.service.getTaskById(id).statusText}`);
      }

      case 'resume_download': {
        const { id } = IdArgs.parse(args);
        this.service.resumeDownload(id);
        return text(`Download ${id}: ${this.service.getTaskById(id).statusText}`);
      }

      case 'cancel_download': {
        const { id } = IdArgs.parse(args);
        await this.service.cancelDownload(id);
        return text(`Download ${id}: ${this.service.getTaskById(id).statusText}`);
      }

      case 'retry_download': {
        const { id, start } = RetryArgs.parse(args);
        await this.service.retryDownload(id);
        if (start) {
          this.service.startDownload(id);
        }
        return text(`Download ${id}: ${this.service.getTaskById(id).statusText}`);
      }

      case 'delete_download': {
        const { id, deleteFile } = DeleteArgs.parse(args);
        const result = await this.service.deleteTask(id, deleteFile);
        let body = `Deleted download task ${id}`;
        if (deleteFile) {
          body += result.fileDeleted ? ' and its file' : result.fileError ? ` (file not deleted: ${result.fileError})` : ' (no file on disk)';
        }
        return text(body);
      }

      case 'list_downloads': {
        const { activeOnly } = ListArgs.parse(args);
        const tasks = activeOnly ? this.service.getActiveTasks() : this.service.getAllTasks();
        if (tasks.length === 0) {
          return text(activeOnly ? 'No active downloads' : 'No download tasks');
        }
        const body = tasks.map((task, index) => `${index + 1}. ${describeTask(task)}`).join('\n\n');
        return text(`${tasks.length} download task(s):\n\n${body}`);
      }

      case 'get_download': {
        const { id } = IdArgs.parse(args);
        const task = this.service.getTaskById(id);
        const speed = this.service.getDownloadSpeed(id);
        return text(`${describeTask(task)}\n   Speed: ${formatSpeed(speed)}`);
      }

      default:
        return failure(`Unknown tool: ${name}`);
    }
  }
}
