export const colors = {
  primary: "#00ff41",      // Matrix green
  secondary: "#ffb000",    // Amber
  dimmed: "#666666",
  error: "#ff3333",
  warning: "#ffaa00",
  text: "#cccccc",
  border: "#333333",
  white: "#ffffff",
  cyan: "#00ffff",
};

export const symbols = {
  bullet: "●",
  arrow: "▸",
  check: "✔",
  x: "✘",
};
