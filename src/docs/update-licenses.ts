import { licensesConfig } from "./config.ts";
import { writeLicenses } from "./licenses.ts";

function main() {
  const r = writeLicenses(licensesConfig(), { profile: process.env.PROFILE });
  if (r.skipped) {
    console.log(`skipping licenses.txt update because PROFILE = ${r.profile}`);
    return;
  }
  console.log(`Wrote ${r.bytes} bytes to ${r.path}.`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
