// ─── Room discussion → mind-map prompt ──────────────────────────────
//
// Pure function of the room snapshot. Every fixed piece of wording is a
// named constant; the format rules spell out the `#` / `##` / `-` shape
// that parseOutline() expects back from the model.

import type { DiscussionComment, DiscussionTopic, Room } from '@mindroom/shared';

export const PROMPT_INTRO =
  'Please produce a structured mind-map summary, in Markdown, of the discussion room below.';

export const PROMPT_EMPTY_ROOM = 'The room has no discussion topics yet.';

export const PROMPT_DISCUSSION_HEADER = 'Discussion topics and comments:';

export const PROMPT_COMMENTS_HEADER = 'Comments:';

export const UNTITLED_TOPIC = 'Untitled topic';

export const ANONYMOUS_NICKNAME = 'Anonymous';

/** Output-format rules; `{language}` is replaced with the response language. */
export const PROMPT_FORMAT_RULES = `Based on the content above, produce a structured mind map in Markdown.

Requirements:
1. Use # for the main title (the overall discussion)
2. Use ## for second-level headings (one per discussion topic)
3. Use - for bullet points (key opinions, consensus, points of disagreement)
4. Keep the content concise and clearly structured
5. Highlight key points and consensus
6. Mark opinions that are disputed
7. Write in {language}

Example format:
# Discussion title
## Topic one
- Main point 1
- Main point 2
- Consensus: xxx
## Topic two
- Key point 1
- Key point 2
- Disagreement: xxx

Output the Markdown directly, without any preface or explanation:`;

export interface PromptOptions {
  /** Language the model should answer in. */
  language?: string;
}

export const DEFAULT_PROMPT_LANGUAGE = 'English';

function formatComment(comment: DiscussionComment): string {
  const nickname = comment.nickname.trim() || ANONYMOUS_NICKNAME;
  return `- ${nickname}: ${comment.content} (👍${String(comment.votes.good)} 👎${String(comment.votes.bad)})`;
}

function formatTopic(topic: DiscussionTopic): string {
  const name = topic.name.trim() || UNTITLED_TOPIC;
  const parts = [`## Topic: ${name}`];
  if (topic.comments.length > 0) {
    parts.push('', PROMPT_COMMENTS_HEADER, ...topic.comments.map(formatComment));
  }
  return parts.join('\n');
}

/**
 * Render a room's topics, comments and vote tallies into the instruction
 * sent to the model.
 *
 * A room without topics still yields a prompt (containing
 * {@link PROMPT_EMPTY_ROOM}) so the model can answer with a bare title.
 */
export function buildMindmapPrompt(room: Room, options: PromptOptions = {}): string {
  const language = options.language?.trim() || DEFAULT_PROMPT_LANGUAGE;
  const title = room.title.trim();
  const intro = title ? `${PROMPT_INTRO}\nRoom: ${title}` : PROMPT_INTRO;

  if (room.topics.length === 0) {
    return `${intro}\n\n${PROMPT_EMPTY_ROOM}\n`;
  }

  const sections = [intro, PROMPT_DISCUSSION_HEADER, ...room.topics.map(formatTopic)];
  return `${sections.join('\n\n')}\n\n${PROMPT_FORMAT_RULES.replace('{language}', language)}\n`;
}
