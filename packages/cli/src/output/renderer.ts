import pc from 'picocolors';

export interface OutputResult {
  status: 'SUCCESS' | 'FAILURE';
  command: string;
  model?: string;
  /** One-line outcome shown after the status mark */
  summary: string;
  /** Labelled file lists shown below the summary */
  files?: Record<string, string[]>;
  [key: string]: unknown;
}

const MAX_LISTED = 10;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      this.renderHuman(data);
    }
  }

  private renderHuman(data: OutputResult): void {
    const mark = data.status === 'SUCCESS' ? pc.green('✅') : pc.red('❌');
    console.log(`${mark} ${data.summary}`);

    for (const [label, files] of Object.entries(data.files ?? {})) {
      if (files.length === 0) continue;
      console.log(pc.bold(`${label}:`));
      files.slice(0, MAX_LISTED).forEach((file) => console.log(`  - ${file}`));
      if (files.length > MAX_LISTED) {
        console.log(pc.gray(`  ... and ${files.length - MAX_LISTED} more.`));
      }
    }
  }
}
