import type { z } from 'zod';
import { dataReplyParsers, decodeReply, supportReplyParsers } from '../contracts/actions';
import type {
  ActionReply,
  DataAction,
  DataArgsInput,
  DataReplies,
  SupportAction,
  SupportArgsInput,
  SupportReplies,
} from '../contracts/actions';
import { createEnvelope, newQueryId } from '../contracts/envelope';
import type { EnvelopeContent, SpecialistKind } from '../contracts/envelope';
import { config } from '../config';
import { IterationLimitError, errorMessage } from '../errors';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import type { AgentTransport } from '../transport/agentTransport';
import { analyzeIntent } from './intent';
import { failed, selectRoute } from './scenarios';
import { CoordinationRun } from './types';
import type { CoordinationResult, Coordinator, Step } from './types';

const PEERS: Record<SpecialistKind, string> = {
  customer_data: 'Data Agent',
  support: 'Support',
};

export interface DispatcherOptions {
  maxIterations?: number;
  logger?: Logger;
}

/**
 * Router side of the desk: classifies a query, runs one coordination protocol
 * against the specialists and folds the replies into one result. Exchanges
 * within a run are strictly sequential.
 */
export class CoordinationDispatcher implements Coordinator {
  private readonly maxIterations: number;
  private readonly log: Logger;

  constructor(
    private readonly transport: AgentTransport,
    options: DispatcherOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? config.router.maxIterations;
    this.log = (options.logger ?? rootLogger).child({ component: 'router' });
  }

  get transportKind() {
    return this.transport.kind;
  }

  /** Never throws; every failure comes back as `success: false` with the partial log. */
  async processQuery(query: string, queryId: string = newQueryId()): Promise<CoordinationResult> {
    const intent = analyzeIntent(query);
    const run = new CoordinationRun(query, queryId, intent);
    this.log.info({ query_id: queryId, query, intent }, 'Processing query');

    try {
      const result = await this.route(run);
      this.log.info(
        { query_id: queryId, scenario: result.scenario, success: result.success, steps: result.coordination_log.length },
        'Query processed',
      );
      return result;
    } catch (err) {
      this.log.error({ query_id: queryId, err: errorMessage(err) }, 'Coordination failed');
      return failed(run, errorMessage(err));
    }
  }

  private async route(run: CoordinationRun): Promise<CoordinationResult> {
    this.enter(run);
    const route = selectRoute(run.query.toLowerCase(), run.intent);
    if (route.reentry) this.enter(run);
    this.log.debug({ query_id: run.queryId, route: route.name, iteration: run.iterations }, 'Scenario selected');
    return route.protocol(this, run);
  }

  private enter(run: CoordinationRun) {
    run.iterations += 1;
    if (run.iterations > this.maxIterations) throw new IterationLimitError();
  }

  askData<A extends DataAction>(
    run: CoordinationRun,
    action: A,
    args: DataArgsInput[A] & EnvelopeContent,
    step: Step<DataReplies[A]>,
  ): Promise<ActionReply<DataReplies[A]>> {
    return this.exchange(run, 'customer_data', action, args, dataReplyParsers[action], step);
  }

  askSupport<A extends SupportAction>(
    run: CoordinationRun,
    action: A,
    args: SupportArgsInput[A] & EnvelopeContent,
    step: Step<SupportReplies[A]>,
  ): Promise<ActionReply<SupportReplies[A]>> {
    return this.exchange(run, 'support', action, args, supportReplyParsers[action], step);
  }

  /** One request envelope out, its reply decoded, one log line each way. */
  private async exchange<R extends object>(
    run: CoordinationRun,
    recipient: SpecialistKind,
    action: string,
    args: EnvelopeContent,
    schema: z.ZodType<R, z.ZodTypeDef, unknown>,
    step: Step<R>,
  ): Promise<ActionReply<R>> {
    const peer = step.peer ?? PEERS[recipient];
    const request = createEnvelope({
      from: 'router',
      to: recipient,
      type: 'request',
      content: { action, ...args },
      queryId: run.queryId,
    });

    run.log.push(`Router → ${peer}: ${step.say}`);
    this.log.debug({ query_id: run.queryId, to: recipient, action }, 'Sending request');
    const reply = await this.transport.send(recipient, request);

    const decoded = decodeReply(schema, reply.content, action);
    run.log.push(`${peer} → Router: ${decoded.success ? step.hear(decoded) : decoded.error}`);
    return decoded;
  }
}
