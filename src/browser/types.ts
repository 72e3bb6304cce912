import type CDP from 'chrome-remote-interface';

export type ChromeClient = Awaited<ReturnType<typeof CDP>>;

export type BrowserOutputStream = 'stdout' | 'stderr';

export type HarnessLogger = ((message: string) => void) & {
  verbose?: boolean;
  /** Receives harness console lines; falls back to the logger itself. */
  console?: (line: string) => void;
  /** Receives browser stdout/stderr lines. Dropped unless set or verbose. */
  browserOutput?: (line: string, stream: BrowserOutputStream) => void;
};

export const noopLogger: HarnessLogger = () => {};

export type BrowserVariant = 'stable' | 'dev' | 'chromium' | 'embedded' | 'headless-shell';

export interface BrowserInstallation {
  readonly variant: BrowserVariant;
  readonly executablePath: string;
  readonly exists: boolean;
}

export interface BrowserExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface DevtoolsTab {
  id: string;
  url: string;
  type: string;
  title: string;
  webSocketDebuggerUrl: string;
}

export interface ConsoleEvent {
  text: string;
  level: string;
  receivedAt: number;
}

export type TabPredicate = (tab: DevtoolsTab) => boolean;
