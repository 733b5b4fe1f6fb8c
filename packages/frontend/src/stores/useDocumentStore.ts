import { create } from "zustand";
import type { SimplifiedDocument, SimplifyDocumentResponse } from "@plainlex/shared";

interface DocumentState {
  filename: string | null;
  originalText: string;
  simplifiedText: string;
  document: SimplifiedDocument | null;
  isUploading: boolean;
  startUpload: () => void;
  setResult: (filename: string, response: SimplifyDocumentResponse) => void;
  failUpload: () => void;
  reset: () => void;
}

const initialState = {
  filename: null,
  originalText: "",
  simplifiedText: "",
  document: null,
  isUploading: false
};

export const useDocumentStore = create<DocumentState>((set) => ({
  ...initialState,
  startUpload: () => set({ isUploading: true }),
  setResult: (filename, response) =>
    set({
      filename,
      originalText: response.original,
      simplifiedText: response.simplified,
      document: response.document,
      isUploading: false
    }),
  // The previously simplified document, if any, stays on screen.
  failUpload: () => set({ isUploading: false }),
  reset: () => set({ ...initialState })
}));
