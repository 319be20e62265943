import Head from 'next/head';

const SITE_NAME = 'World Disaster Dashboard';
const DEFAULT_DESCRIPTION =
  'Historical earthquakes, floods, storms and droughts on an interactive world map, with yearly casualty and damage totals.';

type Props = {
  title?: string | null;
  description?: string | null;
};

export function Seo({ title, description }: Props) {
  const pageTitle = title ? `${title} | ${SITE_NAME}` : SITE_NAME;

  return (
    <Head>
      <title>{pageTitle}</title>
      <meta name="description" content={description ?? DEFAULT_DESCRIPTION} />
      <meta property="og:title" content={pageTitle} />
      <meta property="og:type" content="website" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
    </Head>
  );
}
