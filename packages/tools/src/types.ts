import { z } from 'zod';
import type {
  NewsdeskErrorCode,
  PayloadSigner,
  QueryEngine,
  SignedPayload,
  UnsignedPolicy,
} from '@newsdesk/core';

export interface ToolContext {
  /** Pins one corpus snapshot per call */
  engine: QueryEngine;
  /** Absent when no usable key is configured */
  signer?: PayloadSigner;
  /** What to do when `signer` is absent */
  unsignedPolicy: UnsignedPolicy;
}

export type ToolErrorCode = NewsdeskErrorCode | 'INTERNAL';

export interface ToolResult {
  success: boolean;
  /** Signed envelope on success */
  data: SignedPayload | null;
  error?: string;
  code?: ToolErrorCode;
}

/** What gets canonicalized and signed for every tool response. */
export interface ToolBody<T = unknown> {
  tool: string;
  /** null for responses that do not read the corpus */
  snapshotVersion: number | null;
  count?: number;
  data: T;
}

export interface ToolDefinition {
  /** Unique tool name (e.g., 'search_articles') */
  name: string;
  /** Human-readable description for agents */
  description: string;
  /** Zod schema defining tool input parameters */
  parameters: z.ZodSchema;
  /** Execute the tool with unvalidated parameters */
  execute: (params: unknown, context: ToolContext) => Promise<ToolResult>;
}

export interface ToolGroup {
  /** Group name (e.g., 'articles', 'data', 'standards') */
  name: string;
  /** Human-readable description */
  description: string;
  /** All tool definitions in this group */
  tools: ToolDefinition[];
}
