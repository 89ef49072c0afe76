import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Resolve the parsing libraries from node_modules at runtime instead of bundling them.
  serverExternalPackages: ["cheerio", "jszip"],
};

export default nextConfig;
