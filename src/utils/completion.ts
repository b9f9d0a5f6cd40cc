import type { Command, Option } from "commander";
import type { CompletionShell } from "../types/enums.js";

interface FlagSpec {
  short?: string;
  long?: string;
  description: string;
  takesValue: boolean;
  choices: readonly string[];
  isPath: boolean;
}

function flagSpecs(options: readonly Option[]): FlagSpec[] {
  return options.filter((option) => !option.hidden).map((option) => ({
    short: option.short,
    long: option.long,
    description: option.description,
    takesValue: option.required || option.optional,
    choices: option.argChoices ?? [],
    isPath: option.long === "--dest",
  }));
}

function quoteSingle(text: string): string {
  return text.replace(/'/g, `'\\''`);
}

/** Single-quoted literal for PowerShell and Elvish, where '' is a quote */
function literal(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function flagWords(flag: FlagSpec): string[] {
  return [flag.short, flag.long].filter((word): word is string => Boolean(word));
}

function bashScript(name: string, flags: FlagSpec[]): string {
  const words = flags
    .flatMap((flag) => [flag.short, flag.long])
    .filter((word): word is string => Boolean(word))
    .join(" ");

  const cases = flags
    .filter((flag) => flag.takesValue)
    .map((flag) => {
      const pattern = [flag.short, flag.long].filter(Boolean).join("|");
      const action = flag.isPath
        ? `COMPREPLY=( $(compgen -d -- "$cur") )`
        : flag.choices.length > 0
          ? `COMPREPLY=( $(compgen -W "${flag.choices.join(" ")}" -- "$cur") )`
          : "COMPREPLY=()";
      return `    ${pattern})\n      ${action}\n      return 0\n      ;;`;
    })
    .join("\n");

  const fn = `_${name.replace(/[^A-Za-z0-9_]/g, "_")}_completions`;
  return [
    `${fn}() {`,
    `  local cur prev`,
    `  cur="\${COMP_WORDS[COMP_CWORD]}"`,
    `  prev="\${COMP_WORDS[COMP_CWORD-1]}"`,
    `  case "$prev" in`,
    cases,
    `  esac`,
    `  COMPREPLY=( $(compgen -W "${words}" -- "$cur") )`,
    `}`,
    `complete -F ${fn} ${name}`,
    "",
  ].join("\n");
}

function zshScript(name: string, flags: FlagSpec[]): string {
  const specs = flags.map((flag) => {
    const description = quoteSingle(flag.description.replace(/[[\]]/g, ""));
    const action = !flag.takesValue
      ? ""
      : flag.isPath
        ? ":path:_files -/"
        : flag.choices.length > 0
          ? `:value:(${flag.choices.join(" ")})`
          : ":value:";
    if (flag.short && flag.long) {
      return `    '(${flag.short} ${flag.long})'{${flag.short},${flag.long}}'[${description}]${action}'`;
    }
    const single = flag.long ?? flag.short ?? "";
    return `    '${single}[${description}]${action}'`;
  });

  return [
    `#compdef ${name}`,
    "",
    `_arguments -s \\`,
    specs.join(" \\\n"),
    "",
  ].join("\n");
}

function fishScript(name: string, flags: FlagSpec[]): string {
  const lines = flags.map((flag) => {
    const parts = [`complete -c ${name}`];
    if (flag.short) parts.push(`-s ${flag.short.replace(/^-/, "")}`);
    if (flag.long) parts.push(`-l ${flag.long.replace(/^--/, "")}`);
    if (flag.takesValue) {
      parts.push("-r");
      if (flag.isPath) {
        parts.push(`-a "(__fish_complete_directories)"`);
      } else if (flag.choices.length > 0) {
        parts.push(`-f -a "${flag.choices.join(" ")}"`);
      } else {
        parts.push("-f");
      }
    }
    parts.push(`-d '${quoteSingle(flag.description)}'`);
    return parts.join(" ");
  });

  return [...lines, ""].join("\n");
}

function powershellScript(name: string, flags: FlagSpec[]): string {
  const valueCases = flags
    .filter((flag) => flag.takesValue)
    .flatMap((flag) => {
      const action =
        flag.choices.length > 0
          ? `${flag.choices.map(literal).join(", ")}; break`
          : "return";
      return flagWords(flag).map((word) => `        ${literal(word)} { ${action} }`);
    });

  const results = flags.flatMap((flag) =>
    flagWords(flag).map(
      (word) =>
        `        [CompletionResult]::new(${literal(word)}, ${literal(word.replace(/^-+/, ""))}, [CompletionResultType]::ParameterName, ${literal(flag.description)})`,
    ),
  );

  return [
    "using namespace System.Management.Automation",
    "",
    `Register-ArgumentCompleter -Native -CommandName ${literal(name)} -ScriptBlock {`,
    "    param($wordToComplete, $commandAst, $cursorPosition)",
    "",
    "    $elements = @($commandAst.CommandElements | ForEach-Object { $_.ToString() })",
    "    $previous = if ($wordToComplete) { $elements[-2] } else { $elements[-1] }",
    "    $values = switch -Exact ($previous) {",
    ...valueCases,
    "    }",
    "    if ($values) {",
    "        $values | Where-Object { $_ -like \"$wordToComplete*\" } | ForEach-Object {",
    "            [CompletionResult]::new($_, $_, [CompletionResultType]::ParameterValue, $_)",
    "        }",
    "        return",
    "    }",
    "",
    "    @(",
    ...results,
    "    ) | Where-Object { $_.CompletionText -like \"$wordToComplete*\" }",
    "}",
    "",
  ].join("\n");
}

function elvishScript(name: string, flags: FlagSpec[]): string {
  const valueFlags = flags.filter((flag) => flag.takesValue);
  const guard = (matching: FlagSpec[], body?: string): string[] =>
    matching.length === 0
      ? []
      : [
          `  if (has-value [${matching.flatMap(flagWords).join(" ")}] $prev) {`,
          ...(body ? [`    ${body}`] : []),
          "    return",
          "  }",
        ];

  const chooser = valueFlags
    .filter((flag) => !flag.isPath && flag.choices.length > 0)
    .flatMap((flag) => guard([flag], `put ${flag.choices.join(" ")}`));

  const candidates = flags.flatMap((flag) =>
    flagWords(flag).map((word) => `  cand ${word} ${literal(flag.description)}`),
  );

  return [
    `set edit:completion:arg-completer[${name}] = {|@words|`,
    "  fn cand {|text desc|",
    "    edit:complex-candidate $text &display=$text' '$desc",
    "  }",
    "  var prev = $words[-2]",
    ...guard(
      valueFlags.filter((flag) => flag.isPath),
      "edit:complete-filename $words[-1]",
    ),
    ...chooser,
    ...guard(
      valueFlags.filter((flag) => !flag.isPath && flag.choices.length === 0),
    ),
    ...candidates,
    "}",
    "",
  ].join("\n");
}

/**
 * Shell completion script built from the program's declared options
 */
export function generateCompletion(
  program: Command,
  shell: CompletionShell,
): string {
  const flags = flagSpecs(program.options);
  const name = program.name();

  switch (shell) {
    case "bash":
      return bashScript(name, flags);
    case "zsh":
      return zshScript(name, flags);
    case "fish":
      return fishScript(name, flags);
    case "powershell":
      return powershellScript(name, flags);
    case "elvish":
      return elvishScript(name, flags);
  }
}
