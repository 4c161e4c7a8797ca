import { configuration } from '@/configuration';
import type { Worker } from '@/fleet/fleetConfig';
import { logger } from '@/ui/logger';
import { TmuxUtilities } from '@/utils/tmux';
import { CLI_FAMILY_PROFILES } from './cliFamilies';
import type { WorkerControl } from './workerControl';

export class TmuxWorkerControl implements WorkerControl {
    constructor(private readonly tmux: TmuxUtilities = new TmuxUtilities(configuration.tmuxSocketPath)) {}

    async capture(worker: Worker): Promise<string | null> {
        return this.tmux.capturePane(worker.pane);
    }

    async nudge(worker: Worker, text: string): Promise<boolean> {
        const sent = await this.tmux.sendLine(worker.pane, text);
        logger.debug(`[TMUX] nudge ${worker.id} (${worker.pane}) "${text}": ${sent ? 'sent' : 'failed'}`);
        return sent;
    }

    async reset(worker: Worker): Promise<boolean> {
        const command = CLI_FAMILY_PROFILES[worker.cli].resetCommand;
        const sent = await this.tmux.sendLine(worker.pane, command);
        logger.debug(`[TMUX] reset ${worker.id} with ${command}: ${sent ? 'sent' : 'failed'}`);
        return sent;
    }
}
