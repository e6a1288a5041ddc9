import { createStore } from 'zustand/vanilla';
import type { LoadSource, PetAction, PetStatusView, ReplySource } from '@pocket-pet/core';

export const MAX_NOTICES = 5;
export const MAX_CHAT_LOG = 200;

export type NoticeLevel = 'info' | 'warning' | 'error';

export interface PetNotice {
  id: number;
  level: NoticeLevel;
  text: string;
  at: number;
}

export interface ChatLogEntry {
  at: number;
  from: 'user' | 'pet';
  text: string;
  action?: PetAction;
  source?: ReplySource;
}

export interface PetStoreState {
  status: PetStatusView | null;
  lastAction: PetAction | null;
  notices: PetNotice[];
  chatLog: ChatLogEntry[];
  thinking: boolean;
  loadSource: LoadSource | null;
}

export interface PetStoreActions {
  setStatus: (status: PetStatusView) => void;
  setLastAction: (action: PetAction | null) => void;
  pushNotice: (level: NoticeLevel, text: string, at: number) => void;
  appendChat: (entry: ChatLogEntry) => void;
  setThinking: (thinking: boolean) => void;
  setLoadSource: (source: LoadSource) => void;
  clear: () => void;
}

export type PetStore = ReturnType<typeof createPetStore>;

const defaultState = (): PetStoreState => ({
  status: null,
  lastAction: null,
  notices: [],
  chatLog: [],
  thinking: false,
  loadSource: null,
});

export const createPetStore = () => {
  let nextNoticeId = 1;

  return createStore<PetStoreState & PetStoreActions>()((set) => ({
    ...defaultState(),
    setStatus: (status) =>
      set(() => ({
        status,
      })),
    setLastAction: (action) =>
      set(() => ({
        lastAction: action,
      })),
    pushNotice: (level, text, at) =>
      set((state) => {
        const notice: PetNotice = { id: nextNoticeId, level, text, at };
        nextNoticeId += 1;
        return { notices: [...state.notices, notice].slice(-MAX_NOTICES) };
      }),
    appendChat: (entry) =>
      set((state) => ({
        chatLog: [...state.chatLog, entry].slice(-MAX_CHAT_LOG),
      })),
    setThinking: (thinking) =>
      set(() => ({
        thinking,
      })),
    setLoadSource: (source) =>
      set(() => ({
        loadSource: source,
      })),
    clear: () => set(() => defaultState()),
  }));
};
