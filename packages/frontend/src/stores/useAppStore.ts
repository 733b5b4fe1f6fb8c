import { create } from "zustand";

interface AppState {
  errorMessage: string | null;
  showError: (message: string) => void;
  dismissError: () => void;
}

export const useAppStore = create<AppState>((set) => ({
  errorMessage: null,
  showError: (message) => set({ errorMessage: message }),
  dismissError: () => set({ errorMessage: null })
}));
