export type ChatSender = "user" | "bot";

/** A transcript entry as sent over the wire. */
export interface ChatTurn {
  sender: ChatSender;
  text: string;
}

/** A transcript entry held by the client. */
export interface ChatMessage extends ChatTurn {
  id: string;
  createdAt: Date;
}
