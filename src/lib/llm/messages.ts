/**
 * Chat message builders
 */

import type { ChatMessage, ChatRole } from "../model";
import { fillTemplate } from "../prompts/loader";

export function message(role: ChatRole, template: string, values?: Record<string, string>): ChatMessage {
  return { role, content: values ? fillTemplate(template, values) : template };
}

export function userMessage(template: string, values?: Record<string, string>): ChatMessage {
  return message("user", template, values);
}

export function assistantMessage(content: string): ChatMessage {
  return { role: "assistant", content };
}

/**
 * A user turn that labels a block of context with an HTML comment header
 */
export function labeledBlock(label: string, body: string): ChatMessage {
  return { role: "user", content: `<!-- ${label} -->\n\n${body}` };
}
