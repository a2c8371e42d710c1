import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse as yamlParse } from "yaml";
import { list, type PersistentList } from "../src";

type Answer = boolean | number | number[];

const isAnswer = (value: unknown): value is Answer =>
  typeof value === "boolean" ||
  typeof value === "number" ||
  (Array.isArray(value) && value.every((n) => typeof n === "number"));

/** The answers given to one exercise, read positionally. */
export class Blanks {
  constructor(
    private readonly exercise: string,
    private readonly answers: Answer[]
  ) {}

  private at(index: number): Answer {
    const answer = this.answers[index];
    if (answer === undefined) {
      throw new Error(`${this.exercise}: res${index} is not filled in`);
    }
    return answer;
  }

  boolean(index: number): boolean {
    const answer = this.at(index);
    if (typeof answer !== "boolean") {
      throw new Error(`${this.exercise}: res${index} should be a boolean`);
    }
    return answer;
  }

  number(index: number): number {
    const answer = this.at(index);
    if (typeof answer !== "number") {
      throw new Error(`${this.exercise}: res${index} should be a number`);
    }
    return answer;
  }

  list(index: number): PersistentList<number> {
    const answer = this.at(index);
    if (!Array.isArray(answer)) {
      throw new Error(`${this.exercise}: res${index} should be a list`);
    }
    return list(...answer);
  }
}

export function answersFromYaml(fileName: string) {
  const source = readFileSync(
    fileURLToPath(new URL(fileName, import.meta.url)),
    "utf8"
  );
  const parsed: unknown = yamlParse(source);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`${fileName} should map exercises to answers`);
  }

  const answers = new Map<string, Answer[]>();
  for (const [exercise, values] of Object.entries(parsed)) {
    if (!Array.isArray(values) || !values.every(isAnswer)) {
      throw new Error(`${fileName}: invalid answers for ${exercise}`);
    }
    answers.set(exercise, values);
  }

  return (exercise: string) => new Blanks(exercise, answers.get(exercise) ?? []);
}
