import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  typescript: {
    tsconfigPath: "./tsconfig.json",
  },
  // better-sqlite3 is a native addon and must be required at runtime, not bundled
  serverExternalPackages: ["better-sqlite3"],
};

export default nextConfig;
