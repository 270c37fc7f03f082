import type Anthropic from '@anthropic-ai/sdk';
import { traceable } from 'langsmith/traceable';
import { logger } from '@mindroom/shared';
import type { AITaskType } from './prompts.js';
import { buildSystemPrompt } from './prompts.js';

const log = logger('ai');

/**
 * The AI collaborator consumed by the mind-map pipeline.
 *
 * A workspace is the per-room context every completion runs in. It is
 * created lazily and is idempotent: asking again for the same room returns
 * the same slug.
 */
export interface AIClient {
  ensureWorkspace(roomCode: string, title: string): Promise<string>;
  /** Single-shot completion. Failures propagate; nothing is retried. */
  complete(prompt: string, workspaceSlug: string, taskType: AITaskType): Promise<string>;
}

/** Persisted workspace context. */
export interface WorkspaceRecord {
  slug: string;
  roomCode: string;
  title: string;
  createdAt: number;
}

export interface WorkspaceStore {
  get(slug: string): WorkspaceRecord | null;
  /** Insert unless the slug already exists. */
  create(record: WorkspaceRecord): void;
}

/**
 * Subset of the Anthropic Messages API this client calls. Narrow on
 * purpose so tests can pass an in-process fake.
 */
export interface MessagesApi {
  create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<{
    content: ReadonlyArray<{ type: string; text?: string }>;
  }>;
}

export interface AnthropicAIClientOptions {
  messages: MessagesApi;
  workspaces: WorkspaceStore;
  model: string;
  maxTokens: number;
}

/** Workspace slug for a room code, e.g. `K7QX2M` → `room-k7qx2m`. */
export function workspaceSlugFor(roomCode: string): string {
  return `room-${roomCode.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-')}`;
}

/** Join the text blocks of a Claude response. */
export function extractText(content: ReadonlyArray<{ type: string; text?: string }>): string {
  return content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('');
}

/**
 * {@link AIClient} backed by Claude.
 *
 * Workspaces live in the local database; each completion's system prompt
 * is the task prompt plus the workspace's room title.
 */
export class AnthropicAIClient implements AIClient {
  private readonly messages: MessagesApi;
  private readonly workspaces: WorkspaceStore;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: AnthropicAIClientOptions) {
    this.messages = options.messages;
    this.workspaces = options.workspaces;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
  }

  ensureWorkspace(roomCode: string, title: string): Promise<string> {
    const slug = workspaceSlugFor(roomCode);
    if (!this.workspaces.get(slug)) {
      this.workspaces.create({ slug, roomCode, title, createdAt: Date.now() });
      log.info('workspace created', { slug, roomCode });
    }
    return Promise.resolve(slug);
  }

  async complete(prompt: string, workspaceSlug: string, taskType: AITaskType): Promise<string> {
    const workspace = this.workspaces.get(workspaceSlug);
    if (!workspace) {
      throw new Error(`Unknown workspace "${workspaceSlug}"`);
    }

    const response = await this.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: buildSystemPrompt(taskType, workspace.title),
      messages: [{ role: 'user', content: prompt }],
      metadata: { user_id: workspace.roomCode },
    });

    const text = extractText(response.content).trim();
    if (!text) {
      throw new Error('AI returned an empty completion');
    }
    log.debug('completion received', { workspace: workspaceSlug, taskType, length: text.length });
    return text;
  }
}

/**
 * Wrap an {@link AIClient} so each completion is recorded as a LangSmith run.
 * Tracing only ships data when the LangSmith environment is configured.
 */
export function withTracing(client: AIClient): AIClient {
  const tracedComplete = traceable(
    async function complete(prompt: string, workspaceSlug: string, taskType: AITaskType): Promise<string> {
      return client.complete(prompt, workspaceSlug, taskType);
    },
    { name: 'ai-completion', metadata: { service: 'mindroom' } },
  );
  return {
    ensureWorkspace: (roomCode, title) => client.ensureWorkspace(roomCode, title),
    complete: (prompt, workspaceSlug, taskType) => tracedComplete(prompt, workspaceSlug, taskType),
  };
}
