import path from "path";
import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: [
    "@interview-quotes/core",
  ],
  serverExternalPackages: ["exceljs", "mammoth"],
  // Bundled server code has no usable __dirname for the core package's prompt files.
  env: {
    PROMPTS_DIR: path.resolve(process.cwd(), "../../packages/core/src/prompts"),
  },
};

export default nextConfig;
