import { runCli } from "@/interfaces/cli/recommendCli";

(async () => {
  const exitCode = await runCli(process.argv);
  process.exit(exitCode);
})();
