import { Logger } from "@metamask/logger";

const show = (x: unknown): string => (x instanceof Error ? x.message : String(x));

/**
 * A logger that writes one line per entry, tagged `[exprkit]`. Debug entries
 * are dropped unless `verbose`.
 */
export const makeLogger = (
  verbose: boolean,
  write: (line: string) => void = (line) => console.error(line),
): Logger =>
  new Logger({
    tags: ["exprkit"],
    transports: [
      ({ level, tags, message, data }) => {
        if (level === "debug" && !verbose) return;
        const parts = [`[${tags.join(", ")}]`];
        if (message !== undefined) parts.push(message);
        for (const x of data ?? []) parts.push(show(x));
        write(parts.join(" "));
      },
    ],
  });
