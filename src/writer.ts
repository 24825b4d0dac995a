/**
 * Destination for rendered text. Receives each chunk exactly as it should
 * appear, newlines included.
 */
export type Writer = (text: string) => void;

export const stdoutWriter: Writer = (text) => {
  process.stdout.write(text);
};
