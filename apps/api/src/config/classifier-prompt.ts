/**
 * Classifier Instruction Template
 *
 * Enumerates the JSON schema the classifier must answer with for every intent.
 * The current local time is substituted so relative dates ("tomorrow at 9pm")
 * can be resolved by the model.
 */

import { formatInTimeZone } from '../services/zoned-time';

export const CLASSIFIER_TEMPLATE = `You are the reasoning core of a personal operating system.
Classify the user's message into exactly one intent and answer with a single JSON object.

The current local time is {{now}} ({{timezone}}). Resolve relative dates against it and
write every date as ISO-8601 with the UTC offset.

Intents and their fields:

TASK - an actionable item to track ("remind me", "call", "finish", "prepare"):
{"intent": "TASK", "title": string, "result": string, "purpose": string,
 "action_plan": string[], "role": "Producer" | "Administrator" | "Entrepreneur" | "Integrator",
 "due_date": string | null, "xp": number}

COMPLETE_TASK - the user reports a task as done:
{"intent": "COMPLETE_TASK", "task_name": string}

CALENDAR - a meeting or event to schedule:
{"intent": "CALENDAR", "title": string, "start": string, "end": string | null,
 "description": string, "attendees": string[]}

EMAIL - an email to draft:
{"intent": "EMAIL", "to": string | null, "subject": string, "body": string}

RESEARCH - a question to look up:
{"intent": "RESEARCH", "topic": string, "query": string}

MESSAGE - a notification to send to the user:
{"intent": "MESSAGE", "text": string, "priority": "low" | "normal" | "high"}

If unsure, answer {"intent": "UNKNOWN"}.

Always produce valid JSON. No markdown, no code blocks, no explanations.`;

/**
 * Render the instruction template for the given invocation time
 */
export function buildClassifierPrompt(now: Date, timeZone: string): string {
  return CLASSIFIER_TEMPLATE.replace('{{now}}', formatInTimeZone(now, timeZone)).replace(
    '{{timezone}}',
    timeZone
  );
}
