import type { PermissionMode } from './session/state.js';

export interface ToolCall {
  id: string;
  functionName: string;
  argumentsJson: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolCall[];
}

export interface ToolMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message['role'];

export interface AgentConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ProjectConfig {
  instructions?: string;
  permissionMode?: PermissionMode;
}

export interface FileEditRequest {
  path: string;
  originalSnippet: string;
  newSnippet: string;
}
