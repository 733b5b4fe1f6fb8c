import { useCallback } from "react";
import { apiClient, describeApiError } from "../services/api";
import { useAppStore } from "../stores/useAppStore";
import { toChatTurns, useChatStore } from "../stores/useChatStore";
import { useDocumentStore } from "../stores/useDocumentStore";

export function useDocumentChat() {
  const messages = useChatStore((state) => state.messages);
  const isSending = useChatStore((state) => state.isSending);
  const hasDocument = useDocumentStore((state) => state.simplifiedText.length > 0);

  const send = useCallback(async (content: string) => {
    const question = content.trim();
    const documentContent = useDocumentStore.getState().simplifiedText;
    const chatStore = useChatStore.getState();
    if (question.length === 0 || documentContent.length === 0 || chatStore.isSending) {
      return;
    }

    const history = toChatTurns(chatStore.messages);
    chatStore.addMessage("user", question);
    chatStore.setSending(true);
    useAppStore.getState().dismissError();

    try {
      const reply = await apiClient.chat.send({
        message: question,
        documentContent,
        history
      });
      useChatStore.getState().addMessage("bot", reply);
    } catch (error) {
      console.error("Chat message failed", error);
      useAppStore.getState().showError(describeApiError(error, "Error sending message"));
    } finally {
      useChatStore.getState().setSending(false);
    }
  }, []);

  return { messages, isSending, hasDocument, send };
}
