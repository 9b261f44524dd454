import type { TextOutput } from '../src/repl.js';

export interface CapturedOutput extends TextOutput {
  text: string;
}

/** Output that keeps everything written to it */
export function captureOutput(): CapturedOutput {
  const output: CapturedOutput = {
    text: '',
    write(text: string) {
      output.text += text;
      return true;
    },
  };
  return output;
}
