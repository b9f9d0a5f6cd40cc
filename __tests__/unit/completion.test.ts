import { describe, expect, it } from "vitest";
import { buildProgram } from "../../src/cli.js";
import { generateCompletion } from "../../src/utils/completion.js";

describe("generateCompletion", () => {
  const program = buildProgram("1.2.3");

  it("builds a bash completion function", () => {
    const script = generateCompletion(program, "bash");
    const lines = script.split("\n");

    expect(lines[0]).toBe("_mfdl_completions() {");
    expect(lines).toContain("complete -F _mfdl_completions mfdl");
    expect(script).toContain(
      '    --completion)\n      COMPREPLY=( $(compgen -W "bash zsh fish powershell elvish" -- "$cur") )',
    );
    expect(script).toContain('    -d|--dest)\n      COMPREPLY=( $(compgen -d -- "$cur") )');
    expect(lines).toContain(
      '  COMPREPLY=( $(compgen -W "-V --version -u --urls -d --dest -w --workers -c --clean -r --max-retries -v --verbose -i --interactive --completion" -- "$cur") )',
    );
  });

  it("builds a zsh _arguments spec", () => {
    const lines = generateCompletion(program, "zsh").split("\n");

    expect(lines[0]).toBe("#compdef mfdl");
    expect(lines).toContain(
      "    '(-v --verbose)'{-v,--verbose}'[Show verbose debug output]' \\",
    );
    expect(lines).toContain(
      "    '--completion[Print a shell completion script and exit]:value:(bash zsh fish powershell elvish)'",
    );
  });

  it("leaves the hidden aliases out of the scripts", () => {
    const script = generateCompletion(program, "bash");

    expect(script).not.toContain("--compl ");
    expect(script).not.toContain("--generate-completions");
  });

  it("registers a PowerShell argument completer", () => {
    const lines = generateCompletion(program, "powershell").split("\n");

    expect(lines).toContain(
      "Register-ArgumentCompleter -Native -CommandName 'mfdl' -ScriptBlock {",
    );
    expect(lines).toContain(
      "        '--completion' { 'bash', 'zsh', 'fish', 'powershell', 'elvish'; break }",
    );
    expect(lines).toContain("        '-d' { return }");
    expect(lines).toContain(
      "        [CompletionResult]::new('--workers', 'workers', [CompletionResultType]::ParameterName, 'Maximum number of concurrent downloads')",
    );
  });

  it("sets an Elvish arg-completer", () => {
    const lines = generateCompletion(program, "elvish").split("\n");

    expect(lines[0]).toBe("set edit:completion:arg-completer[mfdl] = {|@words|");
    expect(lines).toContain("  if (has-value [-d --dest] $prev) {");
    expect(lines).toContain("    edit:complete-filename $words[-1]");
    expect(lines).toContain("  if (has-value [--completion] $prev) {");
    expect(lines).toContain("    put bash zsh fish powershell elvish");
    expect(lines).toContain(
      "  if (has-value [-u --urls -w --workers -r --max-retries] $prev) {",
    );
    expect(lines).toContain("  cand --clean 'Remove the destination directory before starting'");
  });

  it("builds fish complete commands", () => {
    const lines = generateCompletion(program, "fish").split("\n");

    expect(lines).toContain(
      "complete -c mfdl -s w -l workers -r -f -d 'Maximum number of concurrent downloads'",
    );
    expect(lines).toContain(
      "complete -c mfdl -s c -l clean -d 'Remove the destination directory before starting'",
    );
    expect(lines).toContain(
      `complete -c mfdl -l completion -r -f -a "bash zsh fish powershell elvish" -d 'Print a shell completion script and exit'`,
    );
    expect(lines).toContain(
      `complete -c mfdl -s d -l dest -r -a "(__fish_complete_directories)" -d 'Destination directory'`,
    );
  });
});
