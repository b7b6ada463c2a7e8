// Intent tags produced by the classifier
export const INTENT_TAGS = [
  'TASK',
  'COMPLETE_TASK',
  'CALENDAR',
  'EMAIL',
  'RESEARCH',
  'MESSAGE',
  'UNKNOWN',
] as const;

export type IntentTag = (typeof INTENT_TAGS)[number];

// Task record enums
export const TASK_ROLES = ['Producer', 'Administrator', 'Entrepreneur', 'Integrator'] as const;
export type TaskRole = (typeof TASK_ROLES)[number];

export const TASK_STATUSES = ['To Do', 'Completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type MessagePriority = 'low' | 'normal' | 'high';

// Downstream handler kinds
export const HANDLER_KINDS = ['calendar', 'email', 'research', 'message', 'experience'] as const;
export type HandlerKind = (typeof HANDLER_KINDS)[number];

/**
 * Fields shared by every classified (non-UNKNOWN) intent
 */
interface ClassifiedIntentBase {
  /** The original user message */
  context: string;
  /** Fixed agent tag identifying who created the record */
  source: string;
}

export interface TaskIntent extends ClassifiedIntentBase {
  intent: 'TASK';
  title: string;
  result: string;
  purpose: string;
  actionPlan: string[];
  role: TaskRole;
  status: TaskStatus;
  dueDate: Date;
  xp: number;
}

export interface CompleteTaskIntent extends ClassifiedIntentBase {
  intent: 'COMPLETE_TASK';
  taskName: string;
  status: 'Completed';
}

export interface CalendarIntent extends ClassifiedIntentBase {
  intent: 'CALENDAR';
  title: string;
  start: Date | null;
  end: Date | null;
  description: string;
  attendees: string[];
}

export interface EmailIntent extends ClassifiedIntentBase {
  intent: 'EMAIL';
  to: string;
  subject: string;
  body: string;
}

export interface ResearchIntent extends ClassifiedIntentBase {
  intent: 'RESEARCH';
  topic: string;
  query: string;
}

export interface MessageIntent extends ClassifiedIntentBase {
  intent: 'MESSAGE';
  text: string;
  priority: MessagePriority;
}

export interface UnknownIntent {
  intent: 'UNKNOWN';
  message: string;
  /** Classifier output kept for audit */
  raw: string;
  reason: string;
}

export type IntentRecord =
  | TaskIntent
  | CompleteTaskIntent
  | CalendarIntent
  | EmailIntent
  | ResearchIntent
  | MessageIntent
  | UnknownIntent;

/** Narrow an IntentRecord union to one variant by tag */
export type IntentOf<T extends IntentTag> = Extract<IntentRecord, { intent: T }>;

// Persisted task record (application-level)
export interface TaskRecord {
  id: string;
  title: string;
  result: string;
  purpose: string;
  actionPlan: string[];
  role: TaskRole;
  status: TaskStatus;
  dueDate: Date | null;
  xp: number;
  source: string;
  context: string;
  calendarLink: string | null;
  emailLink: string | null;
  createdAt: Date;
}

export type NewTaskRecord = Omit<TaskRecord, 'id' | 'calendarLink' | 'emailLink'>;

/** Fields that may be changed after creation */
export type TaskPatch = Partial<Pick<TaskRecord, 'status' | 'calendarLink' | 'emailLink'>>;

/**
 * Status and body returned by one handler invocation
 */
export interface DownstreamResponse {
  status: number;
  body: string;
}

export type RouteOutcome =
  | 'created'
  | 'completed'
  | 'forwarded'
  | 'downstream_error'
  | 'not_found'
  | 'persistence_error'
  | 'unknown';

/**
 * Result of routing one message, returned to the HTTP caller
 */
export interface RouteResult {
  intent: IntentTag;
  outcome: RouteOutcome;
  record?: { id: string; title: string; status: TaskStatus };
  downstream?: DownstreamResponse & { handler: HandlerKind };
  link?: string;
  raw?: string;
  /** Why the message was not classified */
  reason?: string;
  error?: { code: string; message: string };
  warnings: string[];
}

// Type guards

export function isIntentTag(value: unknown): value is IntentTag {
  return INTENT_TAGS.some((tag) => tag === value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
