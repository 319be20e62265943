export function Footer() {
  return (
    <footer className="mt-10 border-t bg-white">
      <div className="mx-auto flex max-w-6xl flex-col gap-2 px-4 py-5 text-sm text-gray-700 md:flex-row md:items-end md:justify-between">
        <span>Damage figures are in thousands of US$, adjusted for inflation.</span>
        <span className="md:text-right">
          Map data &copy;{' '}
          <a className="text-blue-600 hover:underline" href="https://www.openstreetmap.org/copyright" target="_blank" rel="noreferrer">
            OpenStreetMap
          </a>{' '}
          contributors
        </span>
      </div>
    </footer>
  );
}
