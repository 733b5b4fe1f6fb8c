import { Loader2, Upload } from "lucide-react";
import { useRef } from "react";
import { SUPPORTED_UPLOAD_ACCEPT } from "../utils/fileTypes";

interface UploadAreaProps {
  isUploading: boolean;
  filename: string | null;
  onUpload: (file: File) => Promise<void>;
}

export function UploadArea({ isUploading, filename, onUpload }: UploadAreaProps) {
  const inputRef = useRef<HTMLInputElement | null>(null);

  return (
    <section className="panel upload-panel">
      <input
        ref={inputRef}
        type="file"
        accept={SUPPORTED_UPLOAD_ACCEPT}
        className="visually-hidden"
        data-testid="document-file-input"
        disabled={isUploading}
        onChange={(event) => {
          const file = event.currentTarget.files?.[0];
          // clear so the same file can be picked again
          event.currentTarget.value = "";
          if (file) {
            void onUpload(file);
          }
        }}
      />
      <button
        type="button"
        className="upload-button"
        disabled={isUploading}
        onClick={() => inputRef.current?.click()}
      >
        {isUploading ? (
          <Loader2 size={16} className="spin" aria-hidden="true" />
        ) : (
          <Upload size={16} aria-hidden="true" />
        )}
        {isUploading ? "Simplifying..." : "Upload document"}
      </button>
      <p className="muted upload-hint">
        {filename ? `Current document: ${filename}` : "Supported formats: .txt and .pdf"}
      </p>
    </section>
  );
}
