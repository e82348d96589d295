import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";

export type PageLayoutProps = {
  title: string;
  framework: string;
  children: ReactElement;
};

export type PageLayout = (page: PageLayoutProps) => ReactElement;

export default function DefaultLayout({ title, children }: PageLayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body>
        <main className="container">{children}</main>
      </body>
    </html>
  );
}

export const defaultLayout: PageLayout = (page) => <DefaultLayout {...page} />;

export const renderDocument = (page: ReactElement) => `<!DOCTYPE html>${renderToStaticMarkup(page)}`;
