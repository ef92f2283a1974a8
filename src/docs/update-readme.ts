import { readmeConfig } from "./config.ts";
import { updateReadme } from "./readme.ts";

function main() {
  const summary = updateReadme(readmeConfig);
  console.log(`Updated README.md with ${summary.blocks} help block(s).`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
