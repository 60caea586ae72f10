import { createStore } from 'zustand/vanilla'
import type { DatasetHandle, ExecutionMode } from '@/types'
import { DATASET_WARNING_THRESHOLDS, DEFAULT_EXECUTION_MODE, MAX_DATASETS } from '@/lib/constants'
import { DatasetSession } from '@/lib/session/dataset-session'
import type { DatasetSessionOptions } from '@/lib/session/types'

export type OpenDatasetStatus = 'success' | 'warning_8' | 'warning_9' | 'error_limit'

export type OpenDatasetResult =
  | { status: Exclude<OpenDatasetStatus, 'error_limit'>; session: DatasetSession; message: string | null }
  | { status: 'error_limit'; session: null; message: string }

export type OpenDatasetOptions = Omit<DatasetSessionOptions, 'resolveDataset'>

export class WorkspaceLimitError extends Error {
  constructor() {
    super(`Cannot open more than ${MAX_DATASETS} datasets; close one first`)
    this.name = 'WorkspaceLimitError'
  }
}

interface WorkspaceState {
  sessions: DatasetSession[]
  activeSessionId: string | null
  defaultMode: ExecutionMode
}

interface WorkspaceActions {
  /** Create a session for a loaded dataset. Duplicate names get a numeric suffix. */
  openDataset: (options: OpenDatasetOptions) => OpenDatasetResult
  /** Close and forget a session; the first remaining one becomes active if needed */
  removeSession: (id: string) => boolean
  setActiveSession: (id: string) => void
  setDefaultMode: (mode: ExecutionMode) => void
  getSession: (id: string) => DatasetSession | undefined
  getActiveSession: () => DatasetSession | undefined
  /** Join lookup: by session id, falling back to dataset name */
  resolveDataset: (idOrName: string) => DatasetHandle | undefined
  closeAll: () => void
}

export type WorkspaceStore = ReturnType<typeof createWorkspaceStore>

function uniqueName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) return name
  let counter = 1
  while (taken.has(`${name}_${counter}`)) {
    counter++
  }
  return `${name}_${counter}`
}

export function createWorkspaceStore(options: { defaultMode?: ExecutionMode } = {}) {
  return createStore<WorkspaceState & WorkspaceActions>()((set, get) => ({
    sessions: [],
    activeSessionId: null,
    defaultMode: options.defaultMode ?? DEFAULT_EXECUTION_MODE,

    openDataset: (datasetOptions) => {
      const { sessions, defaultMode } = get()
      if (sessions.length >= MAX_DATASETS) {
        console.warn(`[Workspace] Refused to open "${datasetOptions.name}": limit of ${MAX_DATASETS} reached`)
        return { status: 'error_limit', session: null, message: new WorkspaceLimitError().message }
      }

      const name = uniqueName(datasetOptions.name, new Set(sessions.map((s) => s.name)))
      const session = new DatasetSession({
        ...datasetOptions,
        name,
        mode: datasetOptions.mode ?? defaultMode,
        resolveDataset: (idOrName) => get().resolveDataset(idOrName),
      })

      set((state) => ({
        sessions: [...state.sessions, session],
        activeSessionId: state.activeSessionId ?? session.id,
      }))
      console.log(`[Workspace] Opened "${name}" (${get().sessions.length}/${MAX_DATASETS})`)

      const count = get().sessions.length
      const [firstWarning, secondWarning] = DATASET_WARNING_THRESHOLDS
      if (count === firstWarning) {
        return {
          status: 'warning_8',
          session,
          message: `${count} of ${MAX_DATASETS} datasets open; close unused ones to free memory`,
        }
      }
      if (count === secondWarning) {
        return {
          status: 'warning_9',
          session,
          message: `${count} of ${MAX_DATASETS} datasets open; one slot left`,
        }
      }
      return { status: 'success', session, message: null }
    },

    removeSession: (id) => {
      const session = get().getSession(id)
      if (!session) return false
      session.close()
      set((state) => {
        const sessions = state.sessions.filter((s) => s.id !== id)
        const activeSessionId =
          state.activeSessionId === id ? (sessions[0]?.id ?? null) : state.activeSessionId
        return { sessions, activeSessionId }
      })
      console.log(`[Workspace] Closed "${session.name}"`)
      return true
    },

    setActiveSession: (id) => {
      if (!get().getSession(id)) {
        throw new Error(`Dataset ${id} is not open`)
      }
      set({ activeSessionId: id })
    },

    setDefaultMode: (mode) => {
      set({ defaultMode: mode })
    },

    getSession: (id) => get().sessions.find((s) => s.id === id),

    getActiveSession: () => {
      const { activeSessionId } = get()
      return activeSessionId === null ? undefined : get().getSession(activeSessionId)
    },

    resolveDataset: (idOrName) => {
      const { sessions } = get()
      const session = sessions.find((s) => s.id === idOrName) ?? sessions.find((s) => s.name === idOrName)
      return session?.toHandle()
    },

    closeAll: () => {
      for (const session of get().sessions) {
        session.close()
      }
      set({ sessions: [], activeSessionId: null })
    },
  }))
}
