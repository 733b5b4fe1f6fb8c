import { Scale } from "lucide-react";
import { ChatView } from "./chat/ChatView";
import { ErrorBanner } from "./components/ErrorBanner";
import { DocumentComparison } from "./documents/DocumentComparison";
import { UploadArea } from "./documents/UploadArea";
import { useDocumentUpload } from "./hooks/useDocumentUpload";
import { useAppStore } from "./stores/useAppStore";
import { useDocumentStore } from "./stores/useDocumentStore";

export function App() {
  const { upload, isUploading } = useDocumentUpload();
  const filename = useDocumentStore((state) => state.filename);
  const originalText = useDocumentStore((state) => state.originalText);
  const simplifiedText = useDocumentStore((state) => state.simplifiedText);
  const document = useDocumentStore((state) => state.document);
  const errorMessage = useAppStore((state) => state.errorMessage);
  const dismissError = useAppStore((state) => state.dismissError);

  return (
    <div className="app-shell">
      <header className="top-bar">
        <Scale size={20} aria-hidden="true" />
        <h1>Plainlex</h1>
        <span className="muted">Legal documents in plain language</span>
      </header>

      <ErrorBanner message={errorMessage} onDismiss={dismissError} />

      <main className="main-content">
        <UploadArea isUploading={isUploading} filename={filename} onUpload={upload} />
        {simplifiedText ? (
          <>
            <DocumentComparison
              originalText={originalText}
              simplifiedText={simplifiedText}
              document={document}
            />
            <ChatView />
          </>
        ) : null}
      </main>
    </div>
  );
}
