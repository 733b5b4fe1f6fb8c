import { ArrowUp } from "lucide-react";
import { useRef, useState } from "react";

interface ChatInputProps {
  disabled?: boolean;
  isSending: boolean;
  onSend: (content: string) => Promise<void>;
}

export function ChatInput({ disabled = false, isSending, onSend }: ChatInputProps) {
  const [input, setInput] = useState("");
  const textareaRef = useRef<HTMLTextAreaElement | null>(null);

  function autoGrow(el: HTMLTextAreaElement) {
    el.style.height = "auto";
    el.style.height = `${Math.min(el.scrollHeight, 160)}px`;
  }

  const submit = async () => {
    const content = input.trim();
    if (content.length === 0 || disabled || isSending) {
      return;
    }
    setInput("");
    if (textareaRef.current) {
      textareaRef.current.style.height = "auto";
    }
    await onSend(content);
  };

  const canSend = input.trim().length > 0 && !disabled && !isSending;

  return (
    <section className="chat-input-panel">
      <textarea
        ref={textareaRef}
        value={input}
        onChange={(event) => {
          setInput(event.currentTarget.value);
          autoGrow(event.currentTarget);
        }}
        disabled={disabled || isSending}
        placeholder="Ask a question about the document..."
        aria-label="Question"
        rows={1}
        onKeyDown={(event) => {
          if (event.key === "Enter" && !event.shiftKey) {
            event.preventDefault();
            void submit();
          }
        }}
      />
      <button
        type="button"
        className="chat-send-button"
        disabled={!canSend}
        onClick={() => {
          void submit();
        }}
        aria-label="Send message"
      >
        <ArrowUp size={16} strokeWidth={2.5} />
      </button>
    </section>
  );
}
