import type { ChatInputCommand } from './types.js';
import { createLeaveCommand } from './leave.js';
import { createPauseCommand, createResumeCommand } from './pause.js';
import { createPlayCommand } from './play.js';
import { createSeekCommand } from './seek.js';
import { createSkipCommand } from './skip.js';
import { createVolumeCommand } from './volume.js';

export function createChatInputCommands(): ChatInputCommand[] {
  return [
    createPlayCommand(),
    createPauseCommand(),
    createResumeCommand(),
    createSkipCommand(),
    createSeekCommand(),
    createVolumeCommand(),
    createLeaveCommand(),
  ];
}

export type { ChatInputCommand, CommandContext, MusicCommands } from './types.js';
