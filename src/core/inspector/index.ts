import type { IInspectOptions, IPngReport } from '../../@types/index.ts';
import { InspectStateMachine } from './stateMachine.ts';

/**
 * Loads one PNG file and describes its chunks.
 *
 * @param options - File to inspect, logger and optional progress bar.
 * @return The report built by the inspection state machine.
 */
export async function inspect(options: IInspectOptions): Promise<IPngReport> {
    const stateMachine = new InspectStateMachine(options);
    return await stateMachine.run();
}

export { verifyPngFiles, collectPngFiles } from './lib/verifyFiles.ts';
