import { describe, it, expect } from 'vitest';
import { Normalizer } from '../services/normalizer';
import { TransformError } from '../utils/errors';
import { buildListing } from './fixtures';

const DOWNLOAD_TIME = new Date('2024-03-01T09:30:00Z');

function createNormalizer(): Normalizer {
  return new Normalizer({
    sourceSystemId: 23,
    timeZone: 'UTC',
    now: () => DOWNLOAD_TIME,
  });
}

describe('Normalizer', () => {
  it('flattens a listing into a vacancy record', () => {
    const { vacancies } = createNormalizer().normalize([buildListing()]);

    expect(vacancies).toHaveLength(1);
    expect(vacancies[0]).toEqual({
      id: 1001,
      clientId: 7,
      profession: 'Системный администратор',
      candidat: 'Опыт работы от 1 года',
      work: 'Поддержка рабочих станций и серверов',
      compensation: 'Оформление по ТК РФ',
      education: 'Высшее',
      experience: 'От 1 года',
      typeOfWork: 'Полный рабочий день',
      placeOfWork: 'На территории работодателя',
      maritalStatus: 'Не имеет значения',
      children: 'Не имеет значения',
      gender: 'Не имеет значения',
      drivingLicence: 'B, C',
      ageFrom: 0,
      ageTo: 0,
      moveable: false,
      agreement: true,
      agency: 'прямой работодатель',
      town: 'Ханты-Мансийск',
      paymentFrom: 50000,
      paymentTo: null,
      currency: 'rub',
      address: 'ул. Мира, 5',
      latitude: 61.0042,
      longitude: 69.0019,
      metro: null,
      link: 'https://example.com/vacancy/1001',
      datePubTo: '2023-11-14 22:13:20',
      datePublished: '2023-11-03 08:26:40',
      dateArchived: '2023-11-26 12:00:00',
      isClosed: false,
      cataloguesId: '33; 36',
      cataloguesName: 'IT, Интернет, связь, телеком; Администрирование',
      downloadTime: '2024-03-01 09:30:00',
      sourceId: 23,
      classificationId: null,
    });
  });

  it('builds the organization from the embedded client block', () => {
    const { organizations } = createNormalizer().normalize([buildListing()]);

    expect(organizations).toEqual([
      {
        id: 7,
        name: 'ООО Тестовая компания',
        description: 'Интернет-провайдер',
        vacancyCount: 3,
        staffCount: 'от 100 до 500',
        logo: 'https://example.com/logo.png',
        mainAddress: 'ул. Ленина, 1',
        addresses: '[{"addressString":"ул. Ленина, 1"}]',
        url: 'https://example.com',
        link: 'https://example.com/clients/7',
        registeredDate: '2020-09-13 12:26:40',
        downloadTime: '2024-03-01 09:30:00',
      },
    ]);
  });

  it('maps absent dictionary values and zero payments to null', () => {
    const { vacancies } = createNormalizer().normalize([
      buildListing({ education: null, payment_from: 0, driving_licence: [] }),
    ]);

    expect(vacancies[0].education).toBeNull();
    expect(vacancies[0].paymentFrom).toBeNull();
    expect(vacancies[0].drivingLicence).toBeNull();
  });

  it('maps a dictionary value without a title to null', () => {
    const { vacancies } = createNormalizer().normalize([
      buildListing({ agency: { id: 0, title: null }, town: { id: 13 } }),
    ]);

    expect(vacancies[0].agency).toBeNull();
    expect(vacancies[0].town).toBeNull();
  });

  it('skips metro stations without a title', () => {
    const { vacancies } = createNormalizer().normalize([
      buildListing({ metro: [{ id: 1, title: null }, { id: 2, title: 'Театральная' }] }),
    ]);

    expect(vacancies[0].metro).toBe('Театральная');
  });

  it('joins metro station titles', () => {
    const { vacancies } = createNormalizer().normalize([
      buildListing({ metro: [{ id: 1, title: 'Охотный ряд' }, { id: 2, title: 'Театральная' }] }),
    ]);

    expect(vacancies[0].metro).toBe('Охотный ряд; Театральная');
  });

  it('leaves out vacancies whose organization id is 0', () => {
    const { vacancies } = createNormalizer().normalize([
      buildListing({ id: 1, id_client: 0 }),
      buildListing({ id: 2 }),
    ]);

    expect(vacancies.map(vacancy => vacancy.id)).toEqual([2]);
  });

  it('keeps the last organization block seen for a shared id', () => {
    const { organizations } = createNormalizer().normalize([
      buildListing({ id: 1, client: { id: 9, title: 'Старое название' } }),
      buildListing({ id: 2, client: null }),
      buildListing({ id: 3, client: { id: 9, title: 'Новое название' } }),
    ]);

    expect(organizations).toHaveLength(1);
    expect(organizations[0]).toMatchObject({ id: 9, name: 'Новое название', registeredDate: null });
  });

  it('stamps every record of one call with the same download time', () => {
    const { organizations, vacancies } = createNormalizer().normalize([
      buildListing({ id: 1 }),
      buildListing({ id: 2 }),
    ]);

    const stamps = new Set([
      ...organizations.map(organization => organization.downloadTime),
      ...vacancies.map(vacancy => vacancy.downloadTime),
    ]);
    expect([...stamps]).toEqual(['2024-03-01 09:30:00']);
  });

  it('does not mutate its input', () => {
    const listing = buildListing();
    const before = JSON.stringify(listing);

    createNormalizer().normalize([listing]);

    expect(JSON.stringify(listing)).toBe(before);
  });

  it('raises TransformError naming the listing and field on a malformed record', () => {
    const normalize = () => createNormalizer().normalize([buildListing({ moveable: 'yes' })]);

    expect(normalize).toThrow(TransformError);
    expect(normalize).toThrow('Listing 1001 has an unexpected shape: moveable');
  });

  it('returns empty batches for no listings', () => {
    expect(createNormalizer().normalize([])).toEqual({ organizations: [], vacancies: [] });
  });
});
