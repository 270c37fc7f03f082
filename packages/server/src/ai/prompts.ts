/**
 * System prompts for AI completions, one per task type.
 *
 * Sent as the `system` parameter on every Claude call made through
 * {@link AnthropicAIClient.complete}. The workspace title is appended so the
 * model knows which discussion room it is summarising.
 */

/** Kinds of completion the server requests. */
export type AITaskType = 'mindmap';

export const TASK_SYSTEM_PROMPTS: Record<AITaskType, string> = {
  mindmap: `You are the facilitator's assistant in a live discussion room.
Participants post comments under discussion topics and vote on each other's comments.
Your job is to summarise the discussion as a Markdown outline that will be drawn as a mind map.

## Output rules
- Output ONLY the Markdown outline.
- Do NOT wrap the outline in code fences.
- Use exactly one level-1 heading (#), level-2 headings (##) for topics and "-" bullets for points.
- Keep each bullet short; long bullets are truncated in the drawing.
- Weigh comments by their votes: well-supported opinions are consensus, split votes are disputes.`,
};

/** Build the system prompt for `taskType` inside the workspace titled `workspaceTitle`. */
export function buildSystemPrompt(taskType: AITaskType, workspaceTitle: string): string {
  const base = TASK_SYSTEM_PROMPTS[taskType];
  const title = workspaceTitle.trim();
  return title ? `${base}\n\n## Workspace\nDiscussion room: ${title}` : base;
}
