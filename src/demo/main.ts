import { stdoutWriter } from '../writer';
import { runArrayDemo } from './array-demo';
import { runResultDemo } from './result-demo';

export function main(): void {
  runArrayDemo(stdoutWriter);
  runResultDemo(stdoutWriter);
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error('[typed-containers] Demo failed:', error);
    process.exitCode = 1;
  }
}
