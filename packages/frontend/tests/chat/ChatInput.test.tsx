import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ChatInput } from "../../src/chat/ChatInput";

afterEach(cleanup);

describe("ChatInput", () => {
  it("disables the send button for blank input", () => {
    render(<ChatInput isSending={false} onSend={vi.fn()} />);
    fireEvent.change(screen.getByLabelText("Question"), { target: { value: "   " } });
    expect(screen.getByLabelText("Send message")).toBeDisabled();
  });

  it("sends the trimmed question on Enter and clears the field", () => {
    const onSend = vi.fn(async () => undefined);
    render(<ChatInput isSending={false} onSend={onSend} />);
    const textarea = screen.getByLabelText("Question");

    fireEvent.change(textarea, { target: { value: "  What is a lessee?  " } });
    fireEvent.keyDown(textarea, { key: "Enter" });

    expect(onSend).toHaveBeenCalledWith("What is a lessee?");
    expect(textarea).toHaveValue("");
  });

  it("does not send on Shift+Enter", () => {
    const onSend = vi.fn(async () => undefined);
    render(<ChatInput isSending={false} onSend={onSend} />);
    const textarea = screen.getByLabelText("Question");

    fireEvent.change(textarea, { target: { value: "First line" } });
    fireEvent.keyDown(textarea, { key: "Enter", shiftKey: true });

    expect(onSend).not.toHaveBeenCalled();
  });

  it("sends through the button", () => {
    const onSend = vi.fn(async () => undefined);
    render(<ChatInput isSending={false} onSend={onSend} />);

    fireEvent.change(screen.getByLabelText("Question"), { target: { value: "Can I sublet?" } });
    fireEvent.click(screen.getByLabelText("Send message"));

    expect(onSend).toHaveBeenCalledWith("Can I sublet?");
  });

  it("locks the input while a reply is pending", () => {
    render(<ChatInput isSending onSend={vi.fn()} />);
    expect(screen.getByLabelText("Question")).toBeDisabled();
    expect(screen.getByLabelText("Send message")).toBeDisabled();
  });
});
