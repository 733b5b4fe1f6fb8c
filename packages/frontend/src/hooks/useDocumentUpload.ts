import { useCallback } from "react";
import { apiClient, describeApiError } from "../services/api";
import { useAppStore } from "../stores/useAppStore";
import { useChatStore } from "../stores/useChatStore";
import { useDocumentStore } from "../stores/useDocumentStore";
import { UNSUPPORTED_UPLOAD_MESSAGE, isSupportedUpload } from "../utils/fileTypes";

export function useDocumentUpload() {
  const isUploading = useDocumentStore((state) => state.isUploading);

  const upload = useCallback(async (file: File) => {
    const { showError, dismissError } = useAppStore.getState();
    if (!isSupportedUpload(file.name)) {
      showError(UNSUPPORTED_UPLOAD_MESSAGE);
      return;
    }

    const documentStore = useDocumentStore.getState();
    if (documentStore.isUploading) {
      return;
    }

    documentStore.startUpload();
    dismissError();

    try {
      const response = await apiClient.documents.simplify(file);
      useDocumentStore.getState().setResult(file.name, response);
      // A new document starts a new conversation.
      useChatStore.getState().reset();
    } catch (error) {
      console.error("Document upload failed", error);
      useDocumentStore.getState().failUpload();
      showError(describeApiError(error, "Error processing the document"));
    }
  }, []);

  return { upload, isUploading };
}
