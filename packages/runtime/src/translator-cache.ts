/**
 * Call Translator Cache
 *
 * One translator per interface type, held collectibly. A reclaimed entry is
 * rebuilt on the next request.
 *
 * Mutation happens in synchronous sections only, so a reclaim action never
 * interleaves with creating an entry.
 */

import type { TypeRecord } from '@carp/schema';
import { TraceCollector } from '@carp/trace';
import type { Collectible, Collector } from './references.js';
import type { CallTranslator } from './translator.js';

export type TranslatorFactory = (interfaceType: TypeRecord) => CallTranslator;

export class CallTranslatorCache {
  private readonly entries = new Map<TypeRecord, Collectible<CallTranslator>>();
  private readonly trace: TraceCollector;

  constructor(
    private readonly factory: TranslatorFactory,
    private readonly collector: Collector,
    trace?: TraceCollector
  ) {
    this.trace = trace ?? new TraceCollector();
  }

  get(interfaceType: TypeRecord): CallTranslator {
    const cached = this.entries.get(interfaceType)?.deref();
    if (cached) return cached;

    const translator = this.factory(interfaceType);
    const name = interfaceType.name.toString();
    const ref: Collectible<CallTranslator> = this.collector.watch(translator, () => {
      if (this.entries.get(interfaceType) === ref) {
        this.entries.delete(interfaceType);
        this.trace.record('runtime.translator.reclaimed', { type: name }, { severity: 'debug' });
      }
    });
    this.entries.set(interfaceType, ref);

    this.trace.record('runtime.translator.created', {
      type: name,
      calls: translator.plan.calls.size,
    }, { severity: 'debug' });
    return translator;
  }

  get size(): number {
    return this.entries.size;
  }
}
