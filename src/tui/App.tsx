import { Box, Text, useApp, useInput } from "ink";
import { useState } from "react";
import { copyToClipboard } from "../core/clipboard.js";
import {
  WORD_COUNT_RANGE,
  WORD_LENGTH_RANGE,
  generatePassword,
  type PasswordSpec,
} from "../core/composer.js";
import { PasswordError } from "../core/errors.js";
import { defaultRandom, type RandomSource } from "../core/random.js";
import type { Settings } from "../core/settings.js";
import type { Dictionary } from "../core/word-index.js";
import { SettingRow } from "./components/SettingRow.js";

type Field = keyof PasswordSpec;

const FIELDS: { field: Field; label: string; range: { min: number; max: number } }[] = [
  { field: "minWordLength", label: "Min word length", range: WORD_LENGTH_RANGE },
  { field: "maxWordLength", label: "Max word length", range: WORD_LENGTH_RANGE },
  { field: "wordCount", label: "Word count", range: WORD_COUNT_RANGE },
];

type Outcome = { password: string; error?: undefined } | { password?: undefined; error: string };

interface Status {
  text: string;
  isError: boolean;
}

interface AppProps {
  dictionary: Dictionary;
  settings: Settings;
  random?: RandomSource;
}

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, value));
}

// PasswordErrors are shown in place; anything else propagates.
function tryGenerate(
  dictionary: Dictionary,
  spec: PasswordSpec,
  symbols: string,
  random: RandomSource,
): Outcome {
  try {
    return { password: generatePassword(dictionary, spec, { symbols, random }) };
  } catch (err: unknown) {
    if (err instanceof PasswordError) {
      return { error: err.message };
    }
    throw err;
  }
}

export function App({ dictionary, settings, random = defaultRandom }: AppProps) {
  const { exit } = useApp();
  const [spec, setSpec] = useState<PasswordSpec>(settings.spec);
  const [selectedIdx, setSelectedIdx] = useState(0);
  const [outcome, setOutcome] = useState<Outcome>(() =>
    tryGenerate(dictionary, settings.spec, settings.symbols, random),
  );
  const [status, setStatus] = useState<Status | null>(null);

  const regenerate = (next: PasswordSpec) => {
    setOutcome(tryGenerate(dictionary, next, settings.symbols, random));
    setStatus(null);
  };

  const copyCurrent = (password: string) => {
    copyToClipboard(password)
      .then(() => setStatus({ text: "Copied to clipboard", isError: false }))
      .catch((err: unknown) => {
        setStatus({ text: err instanceof Error ? err.message : String(err), isError: true });
      });
  };

  useInput((input, key) => {
    if (input === "q" || key.escape) {
      exit();
    } else if (key.upArrow) {
      setSelectedIdx((i) => Math.max(0, i - 1));
    } else if (key.downArrow) {
      setSelectedIdx((i) => Math.min(FIELDS.length - 1, i + 1));
    } else if (key.leftArrow || key.rightArrow) {
      const { field, range } = FIELDS[selectedIdx];
      const value = clamp(spec[field] + (key.rightArrow ? 1 : -1), range);
      if (value !== spec[field]) {
        const next: PasswordSpec = { ...spec, [field]: value };
        setSpec(next);
        regenerate(next);
      }
    } else if (input === "r" || key.return) {
      regenerate(spec);
    } else if (input === "c" && outcome.password !== undefined) {
      copyCurrent(outcome.password);
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>wordpass</Text>
      <Box marginTop={1}>
        {outcome.password !== undefined ? (
          <Text color="green" bold>
            {outcome.password}
          </Text>
        ) : (
          <Text color="red">{outcome.error}</Text>
        )}
      </Box>
      <Box marginTop={1} flexDirection="column">
        {FIELDS.map(({ field, label, range }, i) => (
          <SettingRow
            key={field}
            label={label}
            value={spec[field]}
            min={range.min}
            max={range.max}
            selected={i === selectedIdx}
          />
        ))}
      </Box>
      {status && (
        <Box marginTop={1}>
          <Text color={status.isError ? "red" : "green"}>{status.text}</Text>
        </Box>
      )}
      <Box marginTop={1}>
        <Text dimColor>↑/↓ select  ←/→ adjust  r regenerate  c copy  q quit</Text>
      </Box>
    </Box>
  );
}
