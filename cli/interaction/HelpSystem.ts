export class HelpSystem {
  constructor(private readonly print: (text: string) => void = text => console.log(text)) {}

  displayHelp(): void {
    this.print(`
Usage: brl-yaml-check [options] <file.yaml>

Check braille translation test documents.

Each test case in the document is translated with the configured translator
and compared against its expected braille. The run ends with a summary line
and exits with status 1 when any case failed.

Options:
  --translator <command>   Translator executable (default: lou_translate)
  -v, --verbose            Log progress information
  -d, --debug              Log debug information
  -V, --version            Show version
  -h, --help               Show this help

Configuration:
  ~/.config/brl-check.json         Global settings
  ./brl-check.config.json          Project settings (override global)

Environment:
  BRL_CHECK_TRANSLATOR     Translator executable
  LOUIS_TABLEPATH          Table search path passed to the translator
  LOG_LEVEL                Log level (error, warn, info, debug)
  BRL_CHECK_LOG_FILE       Also write JSON logs to this file

Examples:
  brl-yaml-check tests/en-us-g2.yaml
  brl-yaml-check --translator ./bin/lou_translate tests/de-g1.yaml
    `);
  }

  displayUsage(): void {
    this.print('Usage: brl-yaml-check file.yaml');
  }
}
