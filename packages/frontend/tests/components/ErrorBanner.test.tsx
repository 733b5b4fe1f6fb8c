import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ERROR_BANNER_TIMEOUT_MS, ErrorBanner } from "../../src/components/ErrorBanner";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  cleanup();
  vi.useRealTimers();
});

describe("ErrorBanner", () => {
  it("renders nothing without a message", () => {
    const { container } = render(<ErrorBanner message={null} onDismiss={vi.fn()} />);
    expect(container).toBeEmptyDOMElement();
  });

  it("shows the message and dismisses on click", () => {
    const onDismiss = vi.fn();
    render(<ErrorBanner message="Error sending message" onDismiss={onDismiss} />);

    expect(screen.getByRole("alert")).toHaveTextContent("Error sending message");
    fireEvent.click(screen.getByLabelText("Dismiss error"));
    expect(onDismiss).toHaveBeenCalledOnce();
  });

  it("hides itself after six seconds", () => {
    const onDismiss = vi.fn();
    render(<ErrorBanner message="Error processing the document" onDismiss={onDismiss} />);

    act(() => {
      vi.advanceTimersByTime(ERROR_BANNER_TIMEOUT_MS - 1);
    });
    expect(onDismiss).not.toHaveBeenCalled();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(onDismiss).toHaveBeenCalledOnce();
  });
});
