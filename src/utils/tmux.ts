/**
 * TypeScript tmux utilities adapted from Python reference
 *
 * Copyright 2025 Andrew Hundt <ATHundt@gmail.com>
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 *
 * Thin tmux wrapper used to observe and poke worker panes
 */

import { spawn, SpawnOptions } from 'child_process';
import { logger } from '@/ui/logger';

export interface TmuxCommandResult {
    returncode: number;
    stdout: string;
    stderr: string;
    command: string[];
}

/** A pane target such as `fleet:agents.1`, `fleet:2` or `%7` */
const PANE_TARGET_PATTERN = /^(%\d+|[A-Za-z0-9._-]+(:[A-Za-z0-9._-]+(\.\d+)?)?)$/;

export class TmuxTargetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TmuxTargetError';
    }
}

export function validatePaneTarget(target: string): void {
    if (!target || !PANE_TARGET_PATTERN.test(target)) {
        throw new TmuxTargetError(`Invalid tmux pane target: ${JSON.stringify(target)}`);
    }
}

/**
 * Signal termination (null) counts as failure
 */
export function normalizeExitCode(code: number | null): number {
    return code === null ? 1 : code;
}

export class TmuxUtilities {
    constructor(
        private readonly socketPath?: string,
        private readonly timeoutMs: number = 5000
    ) {}

    /**
     * Execute tmux command against a pane target
     */
    async executeTmuxCommand(cmd: string[], target?: string): Promise<TmuxCommandResult | null> {
        const baseCmd = this.socketPath ? ['tmux', '-S', this.socketPath] : ['tmux'];
        const fullCmd = [...baseCmd, ...cmd];

        if (target !== undefined) {
            validatePaneTarget(target);
            // Target goes right after the subcommand, before keys/flags that follow
            fullCmd.splice(baseCmd.length + 1, 0, '-t', target);
        }

        return this.executeCommand(fullCmd);
    }

    /**
     * Execute command with subprocess and return result
     */
    private async executeCommand(cmd: string[]): Promise<TmuxCommandResult | null> {
        try {
            const result = await this.runCommand(cmd);
            return {
                returncode: result.exitCode,
                stdout: result.stdout,
                stderr: result.stderr,
                command: cmd
            };
        } catch (error) {
            logger.debug('[TMUX] Command execution failed:', error);
            return null;
        }
    }

    /**
     * Run command using Node.js child_process.spawn
     */
    private runCommand(args: string[], options: SpawnOptions = {}): Promise<{ exitCode: number; stdout: string; stderr: string }> {
        return new Promise((resolve, reject) => {
            const child = spawn(args[0], args.slice(1), {
                stdio: ['ignore', 'pipe', 'pipe'],
                timeout: this.timeoutMs,
                shell: false,
                ...options
            });

            let stdout = '';
            let stderr = '';

            child.stdout?.on('data', (data) => {
                stdout += data.toString();
            });

            child.stderr?.on('data', (data) => {
                stderr += data.toString();
            });

            child.on('close', (code) => {
                resolve({
                    exitCode: normalizeExitCode(code),
                    stdout,
                    stderr
                });
            });

            child.on('error', (error) => {
                reject(error);
            });
        });
    }

    /**
     * Visible content of a pane, or null when the pane cannot be captured
     */
    async capturePane(target: string): Promise<string | null> {
        const result = await this.executeTmuxCommand(['capture-pane', '-p'], target);
        if (result && result.returncode === 0) {
            return result.stdout;
        }
        logger.debug(`[TMUX] capture-pane failed for ${target}: ${result?.stderr ?? 'no result'}`);
        return null;
    }

    /**
     * Type `text` literally into the pane and press Enter
     */
    async sendLine(target: string, text: string): Promise<boolean> {
        const typed = await this.executeTmuxCommand(['send-keys', '-l', text], target);
        if (!typed || typed.returncode !== 0) {
            return false;
        }
        const entered = await this.executeTmuxCommand(['send-keys', 'Enter'], target);
        return entered !== null && entered.returncode === 0;
    }

    /**
     * Read a user option (e.g. `@agent_id`) set on a pane
     */
    async readPaneOption(target: string, option: string): Promise<string | null> {
        const result = await this.executeTmuxCommand(['display-message', '-p', `#{${option}}`], target);
        if (!result || result.returncode !== 0) {
            return null;
        }
        const value = result.stdout.trim();
        return value.length > 0 ? value : null;
    }
}
