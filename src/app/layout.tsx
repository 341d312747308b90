import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Geological Element Map",
  description: "Explore trace element concentrations of geochemical samples on a geological map",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        {children}
      </body>
    </html>
  );
}
