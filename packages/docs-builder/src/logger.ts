import picocolors from "picocolors";
import ora from "ora";
import gradient from "gradient-string";

const BLUE = "#2F6FEB";
const GREEN = "#2DA44E";
const RED = "#CF222E";
const YELLOW = "#FFFF00";

const hex = (color: string): ((text: string) => string) => {
  const ansiColor = hexToAnsi256(color);
  return (text: string) =>
    `\x1b[38;5;${ansiColor}m${text}${picocolors.reset("")}`;
};

export const docsGradient: ReturnType<typeof gradient> = gradient([BLUE, GREEN]);
export const docsBlue = hex(BLUE);
export const docsRed = hex(RED);
export const yellow = hex(YELLOW);

export const docsLoader = (text: string) =>
  ora({
    text,
    spinner: {
      frames: ["   ", docsBlue(">  "), docsBlue(">> "), docsBlue(">>>")],
    },
  });

export const hero = (title: string) => {
  log(picocolors.bold(docsGradient(`\n>>> ${title}\n`)));
};

export const info = (...args: Array<unknown>) => {
  log(docsBlue(picocolors.bold(">>>")), args.join(" "));
};

export const step = (index: number, title: string) => {
  log();
  log(`${index}. ${picocolors.underline(title)}`);
};

export const dimmed = (...args: Array<string>) => {
  log(picocolors.dim(args.join(" ")));
};

export const item = (...args: Array<unknown>) => {
  log(docsBlue(picocolors.bold("  •")), args.join(" "));
};

export const log = (...args: Array<unknown>) => {
  // eslint-disable-next-line no-console -- logger
  console.log(...args);
};

export const warn = (...args: Array<unknown>) => {
  // eslint-disable-next-line no-console -- warn logger
  console.error(yellow(picocolors.bold(">>>")), args.join(" "));
};

export const error = (...args: Array<unknown>) => {
  // eslint-disable-next-line no-console -- error logger
  console.error(docsRed(picocolors.bold(">>>")), args.join(" "));
};

function hexToAnsi256(sHex: string): number {
  const rgb = parseInt(sHex.slice(1), 16);
  const r = Math.floor(rgb / (256 * 256)) % 256;
  const g = Math.floor(rgb / 256) % 256;
  const b = rgb % 256;

  return (
    16 +
    36 * Math.round((r / 255) * 5) +
    6 * Math.round((g / 255) * 5) +
    Math.round((b / 255) * 5)
  );
}
