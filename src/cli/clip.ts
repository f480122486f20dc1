import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createApp } from "../pipeline/app";
import { PipelineError } from "../pipeline/errors";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .option("start", { type: "number", demandOption: true, describe: "Start offset in seconds" })
    .option("caption", { type: "string", demandOption: true })
    .parse();

  const app = createApp();
  try {
    const clip = await app.clips.synthesize(argv.video, argv.start, argv.caption);
    console.log(clip.path);
  } catch (e) {
    if (!(e instanceof PipelineError)) throw e;
    console.error(`Clip failed (${e.code}): ${e.message}`);
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
