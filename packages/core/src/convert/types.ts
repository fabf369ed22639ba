import type { Logger } from '../logger';
import type { CommandRunner } from '../utils/process';

export type UploadedFile = {
  name: string;
  data: Uint8Array;
  mime?: string;
};

export type Artifact = {
  filename: string;
  contentType: string;
  data: Buffer;
};

/** How an external tool is invoked. */
export type ToolchainOptions = {
  binary?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
};
