import type {
  ActionReply,
  CustomerTier,
  DataAction,
  DataArgsInput,
  DataReplies,
  SupportAction,
  SupportArgsInput,
  SupportReplies,
} from '../contracts/actions';
import type { EnvelopeContent } from '../contracts/envelope';
import type { Customer, Ticket } from '../types';
import type { IntentDescriptor } from './intent';

export type ScenarioName =
  | 'Task Allocation'
  | 'Complex Query Coordination'
  | 'Multi-Intent Query'
  | 'Negotiation/Escalation'
  | 'Multi-Step Coordination';

export type CustomerTickets = {
  customer: Customer;
  tickets: Ticket[];
};

export type Negotiation = {
  support_can_handle: boolean;
  context_provided: boolean;
};

/** Fields a protocol may add to its result besides the common ones. */
export type ScenarioFields = {
  customer_info?: Customer | null;
  customer_tier?: CustomerTier;
  statistics?: Record<string, number>;
  matches?: CustomerTickets[];
  negotiation?: Negotiation;
  ticket_history?: Ticket[];
  actions?: string[];
};

export type CoordinationResult = ScenarioFields & {
  query: string;
  query_id: string;
  scenario?: ScenarioName;
  success: boolean;
  response?: string;
  error?: string;
  coordination_log: string[];
};

/** State threaded through one `processQuery` call. Never shared between queries. */
export class CoordinationRun {
  readonly log: string[] = [];
  iterations = 0;

  constructor(
    readonly query: string,
    readonly queryId: string,
    readonly intent: IntentDescriptor,
  ) {}
}

/**
 * What one exchange writes to the coordination log: `Router → peer: say`
 * before sending and `peer → Router: hear(reply)` after.
 */
export interface Step<R> {
  peer?: string;
  say: string;
  hear: (reply: R) => string;
}

export interface Coordinator {
  askData<A extends DataAction>(
    run: CoordinationRun,
    action: A,
    args: DataArgsInput[A] & EnvelopeContent,
    step: Step<DataReplies[A]>,
  ): Promise<ActionReply<DataReplies[A]>>;

  askSupport<A extends SupportAction>(
    run: CoordinationRun,
    action: A,
    args: SupportArgsInput[A] & EnvelopeContent,
    step: Step<SupportReplies[A]>,
  ): Promise<ActionReply<SupportReplies[A]>>;
}

export type Protocol = (coordinator: Coordinator, run: CoordinationRun) => Promise<CoordinationResult>;
