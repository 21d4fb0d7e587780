import type { ObjectId } from 'bson';
import * as process from 'process';

import { DriverInvalidArgumentError, DriverRuntimeError, type AnyError } from './error';

/** @internal */
export function* makeCounter(seed = 0): Generator<number> {
  let count = seed;
  while (true) {
    const newCount = count;
    count += 1;
    yield newCount;
  }
}

/** @internal */
export function noop(): void {
  return;
}

/** @internal */
export function now(): number {
  const hrtime = process.hrtime();
  return Math.floor(hrtime[0] * 1000 + hrtime[1] / 1000000);
}

/** @internal */
export function calculateDurationInMs(started: number | undefined): number {
  if (typeof started !== 'number') {
    return -1;
  }

  const elapsed = now() - started;
  return elapsed < 0 ? 0 : elapsed;
}

/** @internal */
export function arrayStrictEqual(arr: unknown[], arr2: unknown[]): boolean {
  if (!Array.isArray(arr) || !Array.isArray(arr2)) {
    return false;
  }

  return arr.length === arr2.length && arr.every((elt, idx) => elt === arr2[idx]);
}

/** @internal */
export function errorStrictEqual(lhs?: AnyError | null, rhs?: AnyError | null): boolean {
  if (lhs === rhs) {
    return true;
  }

  if (!lhs || !rhs) {
    return lhs === rhs;
  }

  if (lhs.constructor.name !== rhs.constructor.name) {
    return false;
  }

  if (lhs.message !== rhs.message) {
    return false;
  }

  return true;
}

/** Orders two ObjectIds by their raw bytes. */
export function compareObjectId(oid1?: ObjectId | null, oid2?: ObjectId | null): number {
  if (oid1 == null && oid2 == null) {
    return 0;
  }

  if (oid1 == null) {
    return -1;
  }

  if (oid2 == null) {
    return 1;
  }

  return Buffer.from(oid1.id).compare(Buffer.from(oid2.id));
}

interface StateTable<State extends string> {
  [key: string]: State[];
}

interface ObjectWithState<State extends string> {
  s: { state: State };
  emit(event: 'stateChanged', state: State, newState: State): boolean;
}

interface StateTransitionFunction<State extends string> {
  (target: ObjectWithState<State>, newState: State): void;
}

/** @public */
export type EventEmitterWithState = {
  /** @internal */
  stateChanged(previous: string, current: string): void;
};

/** @internal */
export function makeStateMachine<State extends string>(
  stateTable: StateTable<State>
): StateTransitionFunction<State> {
  return function stateTransition(target, newState) {
    const legalStates = stateTable[target.s.state];
    if (legalStates && legalStates.indexOf(newState) < 0) {
      throw new DriverRuntimeError(
        `illegal state transition from [${target.s.state}] => [${newState}], allowed: [${legalStates}]`
      );
    }

    target.emit('stateChanged', target.s.state, newState);
    target.s.state = newState;
  };
}

/**
 * Fisher–Yates Shuffle
 *
 * @param sequence - items to be shuffled
 * @param limit - Defaults to `0`. If nonzero shuffle will slice the randomized array e.g, `.slice(0, limit)` otherwise will return the entire randomized array.
 */
export function shuffle<T>(sequence: Iterable<T>, limit = 0): Array<T> {
  const items = Array.from(sequence); // shallow copy in order to never shuffle the input

  if (limit > items.length) {
    throw new DriverRuntimeError('Limit must be less than the number of items');
  }

  let remainingItemsToShuffle = items.length;
  const lowerBound = limit % items.length === 0 ? 1 : items.length - limit;
  while (remainingItemsToShuffle > lowerBound) {
    // Pick a remaining element
    const randomIndex = Math.floor(Math.random() * remainingItemsToShuffle);
    remainingItemsToShuffle -= 1;

    // And swap it with the current element
    const swapHold = items[remainingItemsToShuffle];
    items[remainingItemsToShuffle] = items[randomIndex];
    items[randomIndex] = swapHold;
  }

  return limit % items.length === 0 ? items : items.slice(lowerBound);
}

/** @internal */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parses a non-negative integer from a number or its decimal string form.
 * Returns `null` for anything else.
 * @internal
 */
export function parseUnsignedInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }

  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }

  return null;
}

/** @internal */
export function promiseWithResolvers<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
} {
  let resolve: ((value: T) => void) | undefined;
  let reject: ((error: Error) => void) | undefined;
  const promise = new Promise<T>(function withResolversExecutor(promiseResolve, promiseReject) {
    resolve = promiseResolve;
    reject = promiseReject;
  });

  if (resolve == null || reject == null) {
    throw new DriverRuntimeError('Promise executor did not run synchronously');
  }

  return { promise, resolve, reject };
}

/**
 * A doubly linked list with O(1) removal at either end, used for wait queues.
 * @internal
 */
export class List<T = unknown> {
  private head: ListNode<T> | null = null;
  private tail: ListNode<T> | null = null;
  private count = 0;

  get length(): number {
    return this.count;
  }

  get [Symbol.toStringTag](): 'List' {
    return 'List';
  }

  toArray(): T[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Generator<T, void, void> {
    for (let node = this.head; node != null; node = node.next) {
      yield node.value;
    }
  }

  push(value: T): void {
    const node: ListNode<T> = { value, next: null, prev: this.tail };
    if (this.tail == null) {
      this.head = node;
    } else {
      this.tail.next = node;
    }
    this.tail = node;
    this.count += 1;
  }

  unshift(value: T): void {
    const node: ListNode<T> = { value, next: this.head, prev: null };
    if (this.head == null) {
      this.tail = node;
    } else {
      this.head.prev = node;
    }
    this.head = node;
    this.count += 1;
  }

  shift(): T | null {
    const node = this.head;
    if (node == null) return null;
    this.unlink(node);
    return node.value;
  }

  pop(): T | null {
    const node = this.tail;
    if (node == null) return null;
    this.unlink(node);
    return node.value;
  }

  first(): T | null {
    return this.head?.value ?? null;
  }

  /** Removes every item matching the filter and returns how many were removed */
  prune(filter: (value: T) => boolean): number {
    let removed = 0;
    for (let node = this.head; node != null; ) {
      const next = node.next;
      if (filter(node.value)) {
        this.unlink(node);
        removed += 1;
      }
      node = next;
    }
    return removed;
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.count = 0;
  }

  private unlink(node: ListNode<T>): void {
    if (node.prev == null) {
      this.head = node.next;
    } else {
      node.prev.next = node.next;
    }

    if (node.next == null) {
      this.tail = node.prev;
    } else {
      node.next.prev = node.prev;
    }

    node.next = null;
    node.prev = null;
    this.count -= 1;
  }
}

interface ListNode<T> {
  value: T;
  next: ListNode<T> | null;
  prev: ListNode<T> | null;
}

/** @public */
export class HostAddress {
  readonly host: string;
  readonly port: number;
  readonly isIPv6: boolean;

  constructor(hostString: string) {
    const escapedHost = hostString.split(' ').join('%20');
    let url: URL;
    try {
      url = new URL(`docstore://${escapedHost}`);
    } catch (error) {
      throw new DriverInvalidArgumentError(`Invalid host address '${hostString}'`, {
        cause: error
      });
    }

    const { hostname, port } = url;
    if (hostname === '') {
      throw new DriverInvalidArgumentError(`Invalid host address '${hostString}'`);
    }

    let normalized = decodeURIComponent(hostname).toLowerCase();
    this.isIPv6 = false;
    if (normalized.startsWith('[') && normalized.endsWith(']')) {
      this.isIPv6 = true;
      normalized = normalized.substring(1, normalized.length - 1);
    }

    this.host = normalized;
    this.port = port !== '' ? Number.parseInt(port, 10) : 27017;

    if (this.port === 0) {
      throw new DriverInvalidArgumentError('Invalid port (zero) with hostname');
    }
    Object.freeze(this);
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.inspect();
  }

  inspect(): string {
    return `new HostAddress('${this.toString()}')`;
  }

  toString(): string {
    if (this.isIPv6) {
      return `[${this.host}]:${this.port}`;
    }
    return `${this.host}:${this.port}`;
  }

  toHostPort(): { host: string; port: number } {
    return { host: this.host, port: this.port };
  }

  static fromString(this: void, s: string): HostAddress {
    return new HostAddress(s);
  }

  static fromHostPort(host: string, port: number): HostAddress {
    if (host.includes(':')) {
      host = `[${host}]`; // IPv6 address
    }
    return HostAddress.fromString(`${host}:${port}`);
  }
}

/** Returns the name of the function-as-a-service platform the process runs on, if any. */
export function getFAASPlatform(env: NodeJS.ProcessEnv = process.env): string | null {
  const {
    AWS_EXECUTION_ENV = '',
    AWS_LAMBDA_RUNTIME_API = '',
    FUNCTIONS_WORKER_RUNTIME = '',
    K_SERVICE = '',
    FUNCTION_NAME = '',
    VERCEL = ''
  } = env;

  const isAWSFaaS =
    AWS_EXECUTION_ENV.startsWith('AWS_Lambda_') || AWS_LAMBDA_RUNTIME_API.length > 0;
  const isAzureFaaS = FUNCTIONS_WORKER_RUNTIME.length > 0;
  const isGCPFaaS = K_SERVICE.length > 0 || FUNCTION_NAME.length > 0;
  const isVercelFaaS = VERCEL.length > 0;

  if (isVercelFaaS) return 'vercel';
  if (isAWSFaaS) return 'aws.lambda';
  if (isAzureFaaS) return 'azure.func';
  if (isGCPFaaS) return 'gcp.func';
  return null;
}
