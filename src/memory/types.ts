export interface RecordedToolCall {
  request: { tool: string; args: Record<string, unknown> };
  result?: unknown;
  content?: string;
}

export interface Attachment {
  file?: string;
  selection?: string;
  line?: number;
  column?: number;
  selectionRange?: string;
}

export interface ConversationEntry {
  id: number;
  prompt: string;
  answer: string;
  tags: string[];
  file: string | null;
  attachments: Attachment[];
  executionTime: number;
  toolCallCount: number;
  toolCalls: RecordedToolCall[];
  createdAt: string;
}

export interface RecordEntryInput {
  prompt: string;
  answer: string;
  tags?: string[];
  file?: string;
  attachments?: Attachment[];
  executionTime?: number;
  toolCalls?: RecordedToolCall[];
}

export interface Note {
  id: number;
  content: string;
  tags: string[];
  links: string[];
  createdAt: string;
  updatedAt: string | null;
}

export interface ScoredNote extends Note {
  score: number;
}

export const TASK_STATUSES = ['pending', 'active', 'paused', 'cancelled', 'completed', 'failed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const WORKFLOW_TYPES = ['simple', 'analysis', 'full'] as const;
export type WorkflowType = (typeof WORKFLOW_TYPES)[number];

export interface TaskLog {
  timestamp: string;
  message: string;
}

export interface PlanUpdate {
  step: number;
  plan: string;
  timestamp: string;
}

export interface Task {
  id: number;
  title: string;
  plan: string;
  status: TaskStatus;
  currentStep: number;
  workflowType: WorkflowType;
  /** keyed by decimal step number */
  stepResults: Record<string, unknown>;
  /** keyed by decimal step number, same key space as stepResults */
  stepToolCalls: Record<string, RecordedToolCall[]>;
  parentTaskId: number | null;
  subtaskResults: Record<string, unknown>;
  logs: TaskLog[];
  planUpdates: PlanUpdate[];
  createdAt: string;
  updatedAt: string;
}

/** Row shape exposed to tools and other collaborators. */
export interface TaskWire {
  id: number;
  title: string;
  plan: string;
  status: TaskStatus;
  current_step: number;
  step_results: Record<string, unknown>;
  tool_calls_json: Record<string, RecordedToolCall[]>;
  workflow_type: WorkflowType;
  parent_task_id: number | null;
  subtask_results: Record<string, unknown>;
}

export interface AegisSnapshot {
  tags: string[];
  summary: string;
  temperature: number;
  createdAt: string;
}

export interface FetchHistoryOptions {
  limit?: number;
  maxTokens?: number;
  includeToolCalls?: boolean;
}

export interface RecallOptions {
  limit?: number;
  maxContentLength?: number;
}
