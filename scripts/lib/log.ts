// stdout may carry the rendered document, so everything here goes to stderr.

let quiet = false;

export function setQuiet(value: boolean) {
  quiet = value;
}

function ts(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour12: false,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
}

export function info(stage: string, msg: string) {
  if (quiet) return;
  console.error(`[${ts()}] ${stage} ${msg}`);
}

export function success(stage: string, msg: string) {
  if (quiet) return;
  console.error(`[${ts()}] ✅ ${stage} ${msg}`);
}

export function fail(stage: string, msg: string) {
  console.error(`[${ts()}] ❌ ${stage} ${msg}`);
}

export function warn(stage: string, msg: string) {
  console.error(`[${ts()}] ⚠️  ${stage} ${msg}`);
}

export function banner(
  title: string,
  details: Record<string, string | number>
) {
  if (quiet) return;
  const line = "═".repeat(60);
  console.error(`\n${line}`);
  console.error(`  ${title}`);
  console.error(line);
  for (const [k, v] of Object.entries(details)) {
    console.error(`  ${k.padEnd(14)} ${v}`);
  }
  console.error(`${line}\n`);
}
