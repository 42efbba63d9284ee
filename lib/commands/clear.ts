import { CommonOptions, openWorkspace } from './common';

export interface ClearCommandOptions extends CommonOptions {
  /**
   * Only clear this package instead of the whole cache
   */
  readonly packageName?: string;
}

export async function clear(options: ClearCommandOptions): Promise<void> {
  const { orchestrator } = await openWorkspace(options);
  if (options.packageName !== undefined) {
    await orchestrator.clearPackage(options.packageName);
  } else {
    await orchestrator.clearAll();
  }
  options.logger.info('CLEARED');
}
