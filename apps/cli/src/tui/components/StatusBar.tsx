import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  version: string;
  freezeOnGameOver: boolean;
}

export function StatusBar({ version, freezeOnGameOver }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        REVERSI v{version}
      </Text>
      <Text color={colors.dimmed}>
        {freezeOnGameOver ? "input stops at game over" : "free play"}
      </Text>
    </Box>
  );
}
