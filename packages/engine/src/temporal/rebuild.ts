import type { InstantData, SequenceOptions, ValueDomain } from "@tempora/contracts";
import type { Temporal } from "./Temporal";
import { TInstant } from "./TInstant";
import { TSequence } from "./TSequence";
import { TSequenceSet } from "./TSequenceSet";
import { isInstant, isSequenceSet } from "./guards";

/**
 * Same-shaped temporal value over `domain`, built sequence by sequence
 * from the instants `transform` returns. Sequences keep their options
 * unless `options` says otherwise; transforms run in time order.
 */
export function rebuild<V, W>(
  temporal: Temporal<V>,
  domain: ValueDomain<W>,
  transform: (seq: TSequence<V>) => InstantData<W>[],
  options: (seq: TSequence<V>) => SequenceOptions = (seq) => seq.options()
): Temporal<W> {
  if (isInstant(temporal)) {
    const [inst] = transform(temporal.toSequence());
    return new TInstant(domain, inst.value, inst.timestamp);
  }
  const sequences = temporal
    .sequences()
    .map((seq) => new TSequence(domain, transform(seq), options(seq)));
  return isSequenceSet(temporal) ? new TSequenceSet(sequences) : sequences[0];
}
