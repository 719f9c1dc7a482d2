export enum MessageRole {
  USER = 'user',
  ASSISTANT = 'assistant',
  SYSTEM = 'system',
}

/**
 * One entry of a conversation window. The timestamp is epoch milliseconds.
 */
export class SessionMessageDto {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: number;

  constructor(role: MessageRole, content: string, timestamp?: number) {
    this.role = role;
    this.content = content;
    this.timestamp = timestamp ?? Date.now();
  }

  static user(content: string, timestamp?: number): SessionMessageDto {
    return new SessionMessageDto(MessageRole.USER, content, timestamp);
  }

  static assistant(content: string, timestamp?: number): SessionMessageDto {
    return new SessionMessageDto(MessageRole.ASSISTANT, content, timestamp);
  }
}
