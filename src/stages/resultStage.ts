import { getLogger } from '../logger';
import { Stage, StageContext } from '../stage';
import { PayloadOf } from '../workUnit';

/**
 * Captures terminal payloads as the run's result. Emits nothing, so the
 * run ends once the queue drains. Register it last.
 */
export class ResultStage extends Stage<'terminal'>
{
	readonly id = 'result';
	protected readonly accepts = 'terminal' as const;
	private readonly logger = getLogger('ResultStage');

	protected process(payload: PayloadOf<'terminal'>, context: StageContext): void
	{
		this.logger.debug('Captured result', { status: payload.status, category: payload.category });
		context.complete(payload);
	}
}
