import { StudentStore } from "../stores/studentStore";
import { Student } from "../domain/student";
import { ShellIO, parseId } from "./helpers";
import { formatRecords } from "./table";

export const MENU_TITLE = "PostgreSQL Student CRUD";
export const MENU_OPTIONS = "1) Create  2) List  3) Update  4) Delete  5) Quit";

/**
 * Signals that the operator's input ran out mid-prompt
 */
class InputClosed extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosed";
  }
}

async function askLine(io: ShellIO, question: string): Promise<string> {
  const answer = await io.ask(question);
  if (answer === null) {
    throw new InputClosed();
  }
  return answer.trim();
}

/**
 * Ask for an id, logging a notice and returning null if it isn't a number
 */
async function askId(io: ShellIO): Promise<number | null> {
  const id = parseId(await askLine(io, "Student ID: "));
  if (id === null) {
    io.log("Invalid ID");
  }
  return id;
}

/**
 * Table rows in column order id, name, email, created_at
 */
function toTableRecords(students: Student[]): Record<string, unknown>[] {
  return students.map((s) => ({
    id: s.id,
    name: s.name,
    email: s.email,
    created_at: s.createdAt,
  }));
}

async function handleCreate(io: ShellIO, store: StudentStore): Promise<void> {
  const name = await askLine(io, "Name: ");
  const email = await askLine(io, "Email: ");

  const result = await store.create({ name, email });
  if (result.ok) {
    io.log(`Created student with ID=${result.value}`);
  } else {
    io.log(`Create error: ${result.error.message}`);
  }
}

async function handleList(io: ShellIO, store: StudentStore): Promise<void> {
  const result = await store.list();
  if (!result.ok) {
    io.log(`List error: ${result.error.message}`);
    return;
  }

  for (const line of formatRecords(toTableRecords(result.value))) {
    io.log(line);
  }
}

async function handleUpdate(io: ShellIO, store: StudentStore): Promise<void> {
  const id = await askId(io);
  if (id === null) {
    return;
  }

  // Blank means "leave unchanged"
  const name = (await askLine(io, "New name (blank to skip): ")) || undefined;
  const email = (await askLine(io, "New email (blank to skip): ")) || undefined;

  const result = await store.update(id, { name, email });
  if (result.ok) {
    io.log(`Updated ${result.value} row(s)`);
  } else {
    io.log(`Update error: ${result.error.message}`);
  }
}

async function handleDelete(io: ShellIO, store: StudentStore): Promise<void> {
  const id = await askId(io);
  if (id === null) {
    return;
  }

  const result = await store.delete(id);
  if (result.ok) {
    io.log(`Deleted ${result.value} row(s)`);
  } else {
    io.log(`Delete error: ${result.error.message}`);
  }
}

type Handler = (io: ShellIO, store: StudentStore) => Promise<void>;

const HANDLERS = new Map<string, Handler>([
  ["1", handleCreate],
  ["2", handleList],
  ["3", handleUpdate],
  ["4", handleDelete],
]);

/**
 * Menu loop. Runs until the operator picks "5" or input ends.
 * Store failures are reported and the loop carries on.
 */
export async function runStudentShell(io: ShellIO, store: StudentStore): Promise<void> {
  try {
    while (true) {
      io.log(MENU_TITLE);
      io.log(MENU_OPTIONS);

      const choice = await askLine(io, "> ");
      if (choice === "5") {
        break;
      }

      const handler = HANDLERS.get(choice);
      if (handler) {
        await handler(io, store);
      } else {
        io.log("Invalid option");
      }
    }
  } catch (err) {
    if (!(err instanceof InputClosed)) {
      throw err;
    }
  }

  io.log("Goodbye");
}
