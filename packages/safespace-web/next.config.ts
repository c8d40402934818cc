import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  // The chat package ships TypeScript sources
  transpilePackages: ["@safespace/chat"],
  serverExternalPackages: ["twilio"],
};

export default nextConfig;
