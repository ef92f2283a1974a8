import { licensesConfig, readmeConfig } from "./config.ts";
import { writeLicenses } from "./licenses.ts";
import { updateReadme } from "./readme.ts";

function main() {
  const licenses = writeLicenses(licensesConfig(), { profile: process.env.PROFILE });
  console.log(licenses.skipped ? `[skip] licenses (PROFILE = ${licenses.profile})` : `[ok] licenses (${licenses.bytes} bytes)`);
  const readme = updateReadme(readmeConfig);
  console.log(`[ok] README.md (${readme.blocks} help block(s))`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
