/** A simulated instrument: takes one command line, returns the reply or null for writes. */
export interface ScpiHandler {
  handleCommand(command: string): string | null;
}

export type BenchLogEntry = {
  instrument: string;
  command: string;
  /** False when fault injection kept the command from reaching the instrument. */
  delivered: boolean;
};

/** Parse the SCPI header and argument of a command line. */
export function splitCommand(command: string): { header: string; arg: string } {
  const trimmed = command.trim();
  const space = trimmed.indexOf(" ");
  if (space === -1) return { header: trimmed.toUpperCase(), arg: "" };
  return { header: trimmed.slice(0, space).toUpperCase(), arg: trimmed.slice(space + 1).trim() };
}

export function parseArg(arg: string): number | null {
  const value = Number(arg);
  return arg.length > 0 && Number.isFinite(value) ? value : null;
}
