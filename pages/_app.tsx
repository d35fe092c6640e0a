import type { AppProps } from "next/app";

import "../styles/globals.css";

import { ThemeProvider } from "@components/theme-provider";

export default function App({ Component, pageProps }: AppProps) {
  return (
    <ThemeProvider attribute="class" defaultTheme="system" enableSystem>
      <Component {...pageProps} />
    </ThemeProvider>
  );
}
