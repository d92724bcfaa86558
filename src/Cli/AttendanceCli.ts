import type { AttendanceResult, AttendanceService } from "../Services/AttendanceService";
import type { AttendanceRecord } from "../Types/types";

export interface Prompt {
  /** Resolves to null once the input stream has ended. */
  ask(question: string): Promise<string | null>;
}

export type Printer = (line: string) => void;

const RULE = "=".repeat(40);

const row = (cells: [string, string, string, string, string]): string => {
  const [matricNo, name, date, clockIn, clockOut] = cells;
  return [matricNo.padEnd(12), name.padEnd(20), date.padEnd(12), clockIn.padEnd(10), clockOut.padEnd(10)].join(" | ");
};

/**
 * Fixed-width records table, newest record first.
 */
export function renderRecordsTable(records: AttendanceRecord[]): string[] {
  if (records.length === 0) {
    return ["No attendance records found."];
  }

  return [
    row(["Matric No", "Name", "Date", "Clock-In", "Clock-Out"]),
    "-".repeat(80),
    ...records.map((record) =>
      row([record.matricNo, record.name, record.date, record.clockIn, record.clockOut ?? "---"]),
    ),
    "",
    `Total records: ${records.length}`,
  ];
}

const describeFailure = (result: Extract<AttendanceResult, { success: false }>): string =>
  `Error: ${result.error.message}`;

/**
 * Menu-driven terminal front end over AttendanceService.
 */
export class AttendanceCli {
  constructor(
    private readonly service: AttendanceService,
    private readonly prompt: Prompt,
    private readonly print: Printer = (line) => console.log(line),
  ) {}

  async run(): Promise<void> {
    this.print("Welcome to the Student Lab Attendance System");

    for (;;) {
      this.printMenu();
      const choice = await this.prompt.ask("\nEnter your choice (1-4): ");

      if (choice === null || choice.trim() === "4") {
        this.print("");
        this.print("Exiting system. Goodbye!");
        return;
      }

      switch (choice.trim()) {
        case "1":
          await this.clockIn();
          break;
        case "2":
          await this.clockOut();
          break;
        case "3":
          await this.viewRecords();
          break;
        default:
          this.print("Invalid choice. Please enter a number between 1 and 4.");
      }
    }
  }

  private printMenu(): void {
    for (const line of ["", RULE, "  Student Lab Attendance System", RULE, "1. Clock In", "2. Clock Out", "3. View Attendance Records", "4. Exit", RULE]) {
      this.print(line);
    }
  }

  private async askIdentity(title: string): Promise<[string, string]> {
    this.print("");
    this.print(`--- ${title} ---`);
    const matricNo = (await this.prompt.ask("Enter Matric No: ")) ?? "";
    const name = (await this.prompt.ask("Enter Name: ")) ?? "";
    return [matricNo, name];
  }

  private async clockIn(): Promise<void> {
    const result = await this.service.clockIn(...(await this.askIdentity("Clock In")));

    if (!result.success) {
      this.print(describeFailure(result));
      return;
    }

    const { record } = result;
    this.print(`Success: ${record.name} (${record.matricNo}) clocked in at ${record.clockIn} on ${record.date}`);
  }

  private async clockOut(): Promise<void> {
    const result = await this.service.clockOut(...(await this.askIdentity("Clock Out")));

    if (!result.success) {
      this.print(describeFailure(result));
      return;
    }

    const { record } = result;
    this.print(`Success: ${record.name} (${record.matricNo}) clocked out at ${record.clockOut}`);
  }

  private async viewRecords(): Promise<void> {
    this.print("");
    this.print("--- Attendance Records ---");

    try {
      const records = await this.service.listRecords();
      for (const line of renderRecordsTable(records)) {
        this.print(line);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.print(`Error: ${message}`);
    }
  }
}

export default AttendanceCli;
