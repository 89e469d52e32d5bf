import type { ConversationStore } from "../conversation/conversationStore";
import type { RecordStore } from "../records/recordStore";
import type { ChatTurn } from "../types/chatSessionTypes";
import type { StudentRecord } from "../types/recordTypes";
import type { ChatEngine } from "./chatEngine";

export const VALID_GRADES = [
  "A+", "A", "A-", "B+", "B", "B-", "C+", "C", "C-", "D+", "D", "F",
] as const;

const HELP_TEXT = [
  "🧭 **Commands:**",
  "- show all students",
  "- find student [name] OR find student [id]",
  "- add student [name] [age] [grade]",
  "- update student [id] [name] [age] [grade]",
  "- delete student [id]",
  "- bye to exit",
].join("\n");

const INVALID_GRADE = `❌ Invalid grade. Valid grades are: ${VALID_GRADES.join(", ")}`;

const isGrade = (grade: string) =>
  VALID_GRADES.some((valid) => valid === grade.toUpperCase());

const isInteger = (value: string) => /^\d+$/.test(value);

const describe = (s: StudentRecord) =>
  `ID: ${s.id}, Name: ${s.name}, Age: ${s.age}, Grade: ${s.grade.toUpperCase()}`;

/** Text after a command prefix, or null when the input is another command. */
const argsAfter = (input: string, command: string) => {
  const lower = input.toLowerCase();
  if (lower !== command && !lower.startsWith(`${command} `)) return null;
  return input.slice(command.length).trim();
};

/**
 * Keyword-command assistant over the student record store.
 */
export class StudentCommandEngine implements ChatEngine {
  constructor(
    private records: RecordStore,
    private conversations: ConversationStore
  ) {}

  async answer(sessionId: string, question: string) {
    let response: string;
    try {
      response = await this.processCommand(question);
    } catch (err: unknown) {
      console.error("RECORD_ENGINE_ERR:", err);
      response = `⚠️ Error: ${err instanceof Error ? err.message : String(err)}`;
    }
    await this.conversations.appendExchange(sessionId, question, response);
    return response;
  }

  getHistory(sessionId: string): Promise<ChatTurn[]> {
    return this.conversations.get(sessionId);
  }

  clearSession(sessionId: string) {
    return this.conversations.clear(sessionId);
  }

  async processCommand(rawInput: string): Promise<string> {
    const input = rawInput.trim().replace(/\s+/g, " ");
    const lower = input.toLowerCase();

    if (lower === "hi" || lower === "hello") {
      return "👋 Hi! I'm your Student Assistant. Type 'help' to see what I can do!";
    }
    if (lower === "help") return HELP_TEXT;
    if (["bye", "exit", "quit"].includes(lower)) {
      return "👋 Goodbye! Have a nice day.";
    }
    if (lower === "show all students") return this.showAll();

    let args = argsAfter(input, "find student");
    if (args !== null) return this.find(args);

    args = argsAfter(input, "add student");
    if (args !== null) return this.add(args);

    args = argsAfter(input, "update student");
    if (args !== null) return this.update(args);

    args = argsAfter(input, "delete student");
    if (args !== null) return this.remove(args);

    return "🤔 Sorry, I didn't understand that. Type 'help' to see available commands.";
  }

  private async showAll() {
    const students = await this.records.fetchAll();
    if (students.length === 0) return "😕 No students found.";

    const rows = students.map(
      (s) => `| ${s.id} | ${s.name} | ${s.age} | ${s.grade.toUpperCase()} |`
    );
    return [
      "📋 **Students List:**",
      "",
      "| ID | Name | Age | Grade |",
      "|:----:|:--------|:----:|:------:|",
      ...rows,
    ].join("\n");
  }

  private async find(query: string) {
    if (!query) {
      return "❌ Please specify a name or ID. Example: find student Ahmed OR find student 3";
    }
    const students = await this.records.fetchAll();
    const matches = isInteger(query)
      ? students.filter((s) => s.id === Number(query))
      : students.filter((s) => s.name.toLowerCase().includes(query.toLowerCase()));

    if (matches.length === 0) return `🙅 No student found matching '${query}'.`;
    return `🔍 Found:\n${matches.map(describe).join("\n")}`;
  }

  private async add(args: string) {
    const parts = args ? args.split(" ") : [];
    if (parts.length < 3) return "❌ Format error. Use: add student [name] [age] [grade]";

    const grade = parts[parts.length - 1];
    const age = parts[parts.length - 2];
    const name = parts.slice(0, -2).join(" ");
    if (!isInteger(age)) return "❌ Format error. Age must be a number.";
    if (!isGrade(grade)) return INVALID_GRADE;

    await this.records.insert({ name, age: Number(age), grade: grade.toLowerCase() });
    return `✅ Student '${name}' added successfully!`;
  }

  private async update(args: string) {
    const usage = "❌ Format error. Use: update student [id] [name] [age] [grade]";
    const parts = args ? args.split(" ") : [];
    if (parts.length < 4) return usage;

    const [id] = parts;
    const grade = parts[parts.length - 1];
    const age = parts[parts.length - 2];
    const name = parts.slice(1, -2).join(" ");
    if (!isInteger(id) || !isInteger(age)) return usage;
    if (!isGrade(grade)) return INVALID_GRADE;

    const updated = await this.records.update(Number(id), {
      name,
      age: Number(age),
      grade: grade.toLowerCase(),
    });
    if (!updated) return `⚠️ No student found with ID ${id}.`;
    return `✏️ Student ID ${id} updated successfully!`;
  }

  private async remove(args: string) {
    if (!isInteger(args)) return "❌ Format error. Use: delete student [id]";

    const deleted = await this.records.delete(Number(args));
    if (!deleted) return `⚠️ No student found with ID ${args}.`;
    return `🗑️ Student ID ${args} deleted successfully!`;
  }
}
