import { Box, Text } from "ink";

interface Props {
  label: string;
  value: number;
  min: number;
  max: number;
  selected: boolean;
}

export function SettingRow({ label, value, min, max, selected }: Props) {
  return (
    <Box>
      <Text color={selected ? "cyan" : undefined}>{selected ? "› " : "  "}</Text>
      <Text bold={selected} color={selected ? "cyan" : undefined}>
        {label.padEnd(18)}
      </Text>
      <Text dimColor={value <= min}>{"◀ "}</Text>
      <Text bold>{String(value).padStart(2)}</Text>
      <Text dimColor={value >= max}>{" ▶"}</Text>
    </Box>
  );
}
