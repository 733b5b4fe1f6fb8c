import { create } from "zustand";
import type { ChatMessage, ChatSender, ChatTurn } from "@plainlex/shared";

interface ChatState {
  messages: ChatMessage[];
  isSending: boolean;
  addMessage: (sender: ChatSender, text: string) => ChatMessage;
  setSending: (isSending: boolean) => void;
  reset: () => void;
}

let messageSequence = 0;

function nextMessageId(): string {
  messageSequence += 1;
  return `msg-${Date.now().toString(36)}-${messageSequence}`;
}

export const useChatStore = create<ChatState>((set) => ({
  messages: [],
  isSending: false,
  addMessage: (sender, text) => {
    const message: ChatMessage = {
      id: nextMessageId(),
      sender,
      text,
      createdAt: new Date()
    };
    set((state) => ({
      messages: [...state.messages, message]
    }));
    return message;
  },
  setSending: (isSending) => set({ isSending }),
  reset: () =>
    set({
      messages: [],
      isSending: false
    })
}));

/** The backend keeps at most this many prior turns as context. */
export const CHAT_HISTORY_TURN_LIMIT = 50;

export function toChatTurns(messages: ChatMessage[], limit = CHAT_HISTORY_TURN_LIMIT): ChatTurn[] {
  return messages.slice(-limit).map(({ sender, text }) => ({ sender, text }));
}
