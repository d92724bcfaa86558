import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { AttendanceCli, type Prompt } from "./Cli/AttendanceCli";
import { loadConfig } from "./config";
import { createAttendanceRepository } from "./Repositories";
import { AttendanceService } from "./Services/AttendanceService";

async function main() {
  const config = loadConfig();

  const repository = createAttendanceRepository(config);
  await repository.init();

  const service = new AttendanceService(repository, { clearMode: config.CLEAR_MODE });

  const readline = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  readline.on("close", () => {
    closed = true;
  });

  const prompt: Prompt = {
    ask: async (question) => {
      if (closed) {
        return null;
      }
      try {
        return await readline.question(question);
      } catch (error) {
        if (closed) {
          return null;
        }
        throw error;
      }
    },
  };

  try {
    await new AttendanceCli(service, prompt).run();
  } finally {
    readline.close();
    await repository.close();
  }
}

main().catch((error) => {
  console.error("❌ Attendance CLI failed:", error);
  process.exitCode = 1;
});
