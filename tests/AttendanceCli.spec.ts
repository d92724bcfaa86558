import { AttendanceCli, renderRecordsTable, type Prompt } from "../src/Cli/AttendanceCli";
import { AttendanceService } from "../src/Services/AttendanceService";
import { FixedClock, at } from "./support/FixedClock";
import { InMemoryAttendanceRepository } from "./support/InMemoryAttendanceRepository";

class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }
}

const HEADER = "Matric No    | Name                 | Date         | Clock-In   | Clock-Out ";

describe("renderRecordsTable", () => {
  it("prints a header, one padded row per record and the total", () => {
    const lines = renderRecordsTable([
      { id: 2, matricNo: "B222", name: "Bob", date: "2026-10-18", clockIn: "10:00:00", clockOut: null },
      { id: 1, matricNo: "A12345", name: "Jane", date: "2026-10-18", clockIn: "09:05:07", clockOut: "11:30:00" },
    ]);

    expect(lines).toEqual([
      HEADER,
      "-".repeat(80),
      "B222         | Bob                  | 2026-10-18   | 10:00:00   | ---       ",
      "A12345       | Jane                 | 2026-10-18   | 09:05:07   | 11:30:00  ",
      "",
      "Total records: 2",
    ]);
  });

  it("says so when there are no records", () => {
    expect(renderRecordsTable([])).toEqual(["No attendance records found."]);
  });
});

describe("AttendanceCli", () => {
  let repository: InMemoryAttendanceRepository;
  let clock: FixedClock;
  let service: AttendanceService;
  let output: string[];

  const runWith = async (answers: string[]) => {
    const prompt = new ScriptedPrompt(answers);
    await new AttendanceCli(service, prompt, (line) => output.push(line)).run();
    return prompt;
  };

  beforeEach(() => {
    repository = new InMemoryAttendanceRepository();
    clock = new FixedClock(at(18, 9, 5, 7));
    service = new AttendanceService(repository, { clock });
    output = [];
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("shows the menu and exits on choice 4", async () => {
    const prompt = await runWith(["4"]);

    expect(output).toEqual([
      "Welcome to the Student Lab Attendance System",
      "",
      "=".repeat(40),
      "  Student Lab Attendance System",
      "=".repeat(40),
      "1. Clock In",
      "2. Clock Out",
      "3. View Attendance Records",
      "4. Exit",
      "=".repeat(40),
      "",
      "Exiting system. Goodbye!",
    ]);
    expect(prompt.questions).toEqual(["\nEnter your choice (1-4): "]);
  });

  it("clocks a student in and out, then lists the closed record", async () => {
    const prompt = new ScriptedPrompt(["1", " A12345 ", "Jane", "2", "A12345", "Jane", "3", "4"]);
    const cli = new AttendanceCli(service, prompt, (line) => output.push(line));

    const original = prompt.ask.bind(prompt);
    jest.spyOn(prompt, "ask").mockImplementation(async (question) => {
      // Clock-out happens later in the morning
      if (prompt.questions.length === 4) {
        clock.set(at(18, 11, 30));
      }
      return original(question);
    });

    await cli.run();

    expect(output).toContain("Success: Jane (A12345) clocked in at 09:05:07 on 2026-10-18");
    expect(output).toContain("Success: Jane (A12345) clocked out at 11:30:00");
    expect(output).toContain("A12345       | Jane                 | 2026-10-18   | 09:05:07   | 11:30:00  ");
    expect(output).toContain("Total records: 1");
    expect(prompt.questions.slice(1, 3)).toEqual(["Enter Matric No: ", "Enter Name: "]);
  });

  it("prints service errors with an Error prefix", async () => {
    await runWith(["2", "A12345", "Jane", "1", "", "Jane", "4"]);

    expect(output).toContain("Error: A12345 has not clocked in yet.");
    expect(output).toContain("Error: Please enter both Matric No and Name");
    expect(await repository.listAll()).toEqual([]);
  });

  it("shows an open record with dashes for the clock-out", async () => {
    repository.seed({ matricNo: "B222", name: "Bob", date: "2026-10-18", clockIn: "10:00:00", clockOut: null });

    await runWith(["3", "4"]);

    const table = output.indexOf(HEADER);
    expect(output[table - 1]).toBe("--- Attendance Records ---");
    expect(output[table + 2]).toBe("B222         | Bob                  | 2026-10-18   | 10:00:00   | ---       ");
    expect(output[table + 4]).toBe("Total records: 1");
  });

  it("rejects an unknown choice and keeps going", async () => {
    await runWith(["7", "4"]);

    expect(output).toContain("Invalid choice. Please enter a number between 1 and 4.");
    expect(output[output.length - 1]).toBe("Exiting system. Goodbye!");
  });

  it("exits when the input ends", async () => {
    await runWith(["1", "A12345"]);

    expect(output).toContain("Error: Please enter both Matric No and Name");
    expect(output[output.length - 1]).toBe("Exiting system. Goodbye!");
  });

  it("reports a store failure while listing records", async () => {
    jest.spyOn(console, "error").mockImplementation(() => {});
    repository.failure = new Error("disk gone");

    await runWith(["3", "4"]);

    expect(output).toContain("Error: Could not reach the attendance store.");
  });
});
