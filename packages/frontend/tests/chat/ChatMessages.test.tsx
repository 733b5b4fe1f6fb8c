import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import type { ChatMessage } from "@plainlex/shared";
import { ChatMessages } from "../../src/chat/ChatMessages";

afterEach(cleanup);

const messages: ChatMessage[] = [
  { id: "m1", sender: "user", text: "Who pays for repairs?", createdAt: new Date("2026-01-01T10:00:00Z") },
  { id: "m2", sender: "bot", text: "The landlord pays for major repairs.", createdAt: new Date("2026-01-01T10:00:05Z") }
];

describe("ChatMessages", () => {
  it("shows a prompt when the transcript is empty", () => {
    render(<ChatMessages messages={[]} isSending={false} />);
    expect(screen.getByText("Ask anything about the simplified document.")).toBeInTheDocument();
  });

  it("renders user and bot messages", () => {
    const { container } = render(<ChatMessages messages={messages} isSending={false} />);

    expect(screen.getByText("Who pays for repairs?")).toBeInTheDocument();
    expect(screen.getByText("The landlord pays for major repairs.")).toBeInTheDocument();
    expect(container.querySelectorAll(".chat-message.is-user")).toHaveLength(1);
    expect(container.querySelectorAll(".chat-message.is-bot")).toHaveLength(1);
  });

  it("shows a pending indicator while sending", () => {
    render(<ChatMessages messages={messages.slice(0, 1)} isSending />);
    expect(screen.getByText("Thinking...")).toBeInTheDocument();
  });
});
