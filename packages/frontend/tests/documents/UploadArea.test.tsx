import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { UploadArea } from "../../src/documents/UploadArea";

afterEach(cleanup);

describe("UploadArea", () => {
  it("accepts only text and PDF files", () => {
    render(<UploadArea isUploading={false} filename={null} onUpload={vi.fn()} />);
    expect(screen.getByTestId("document-file-input")).toHaveAttribute("accept", ".txt,.pdf");
    expect(screen.getByText("Supported formats: .txt and .pdf")).toBeInTheDocument();
  });

  it("passes the selected file to onUpload", () => {
    const onUpload = vi.fn(async () => undefined);
    render(<UploadArea isUploading={false} filename={null} onUpload={onUpload} />);
    const file = new File(["The tenant shall pay rent."], "lease.txt", { type: "text/plain" });

    fireEvent.change(screen.getByTestId("document-file-input"), { target: { files: [file] } });

    expect(onUpload).toHaveBeenCalledWith(file);
  });

  it("disables the button and shows progress while uploading", () => {
    render(<UploadArea isUploading filename="lease.txt" onUpload={vi.fn()} />);

    const button = screen.getByRole("button", { name: "Simplifying..." });
    expect(button).toBeDisabled();
    expect(screen.getByText("Current document: lease.txt")).toBeInTheDocument();
  });
});
