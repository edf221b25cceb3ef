import type { AudibleLibraryItem, AudibleLibraryResponse } from './types';

export const SAMPLE_LIBRARY: AudibleLibraryResponse & { items: AudibleLibraryItem[] } = {
  items: [
    {
      asin: 'B0TEST0001',
      title: 'The Fellowship of the Ring',
      authors: [{ asin: 'A1', name: 'J. R. R. Tolkien' }],
      narrators: [{ name: 'Andy Serkis' }],
      runtime_length_min: 1343,
      release_date: '2021-09-23',
      purchase_date: '2025-08-15T10:12:00.000Z'
    },
    {
      asin: 'B0TEST0002',
      title: 'Good Omens',
      authors: [{ name: 'Terry Pratchett' }, { name: 'Neil Gaiman' }],
      narrators: [{ name: 'Martin Jarvis' }],
      runtime_length_min: 758,
      release_date: '2006-09-26',
      purchase_date: '2025-09-01T08:00:00.000Z'
    },
    {
      asin: 'B0TEST0003',
      title: 'Short Story, Abridged',
      authors: [{ name: 'Anonymous' }],
      narrators: [],
      runtime_length_min: 45
    }
  ]
};
