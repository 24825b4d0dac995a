import { FixedArray } from '../containers/FixedArray';
import { Writer } from '../writer';
import { strBinding } from './exit-code';

const NAMES = ['Alice', 'Bob', 'Charlie', 'Diana', 'Eve'] as const;

/**
 * Fill a five-slot string array with names and write its debug rendering.
 */
export function runArrayDemo(writer: Writer): void {
  const created = FixedArray.create(strBinding, NAMES.length);
  if (!created.ok) {
    throw new Error(`Array demo failed: ${created.error.message}`);
  }

  const names = created.value;
  NAMES.forEach((name, index) => {
    names.set(index, name);
  });

  writer(`${names.debug()}\n`);
  names.release();
}
