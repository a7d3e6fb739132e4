import React from 'react';

export interface LayoutProps {
  title: string;
  /** Bundle names under /static/js, without extension */
  scripts?: string[];
  children: React.ReactNode;
}

export function Layout({ title, scripts = [], children }: LayoutProps) {
  return (
    <html lang='en'>
      <head>
        <meta charSet='utf-8' />
        <meta name='viewport' content='width=device-width, initial-scale=1' />
        <title>{`${title} | SEO Insight`}</title>
        <link rel='stylesheet' href='/static/css/style.css' />
        {scripts.map(name => (
          <script key={name} src={`/static/js/${name}.js`} defer />
        ))}
      </head>
      <body>
        <header className='site-header'>
          <a href='/' className='brand'>SEO Insight</a>
        </header>
        <main className='container'>{children}</main>
        <footer className='site-footer'>
          <p>Reports are stored on this server and listed on the home page.</p>
        </footer>
      </body>
    </html>
  );
}
