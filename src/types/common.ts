/**
 * Common type definitions for the conversation system
 */

/**
 * One entry of a conversation transcript as exchanged with clients
 */
export interface ChatMessage {
  type: 'human' | 'ai';
  content: string;
}

/**
 * A tool call the agent wants to make that waits on the customer's decision
 */
export interface PendingApproval {
  toolCallId: string;
  toolName: string;
  arguments: string;
}

export interface ApprovalDecision {
  toolCallId: string;
  approved: boolean;
}
