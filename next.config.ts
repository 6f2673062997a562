import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  output: "standalone",
  serverExternalPackages: ["sharp", "sql.js", "mupdf"],
};

export default nextConfig;
