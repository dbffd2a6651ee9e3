import { createInterface, type Interface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';

export function isConfirmation(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export class Prompt {
  private rl: Interface | null = null;

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({ input, output });
    }
    const answer = await this.rl.question(question);
    return answer.trim();
  }

  async confirm(question: string): Promise<boolean> {
    return isConfirmation(await this.ask(`${question} [y/N] `));
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
