/**
 * Capture console output during a function call.
 */
export function captureOutput(fn: () => void, stream: 'log' | 'error' = 'log'): string {
  const original = console[stream];
  let output = '';
  console[stream] = (...args: unknown[]) => {
    output += `${args.map(String).join(' ')}\n`;
  };
  try {
    fn();
  } finally {
    console[stream] = original;
  }
  return output;
}
