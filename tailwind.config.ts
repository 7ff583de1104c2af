import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./app/**/*.{ts,tsx}", "./src/components/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        surface: {
          DEFAULT: "#ffffff",
          border: "#e5e7eb",
          muted: "#f9fafb",
        },
        muted: "#6b7280",
      },
    },
  },
  plugins: [],
};

export default config;
