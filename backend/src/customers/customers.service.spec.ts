import { loadAppConfig } from '../config/app.config';
import type { CustomersRepository } from './customers.repository';
import { CustomersService } from './customers.service';
import type {
  AddressRecord,
  CustomerRecord,
  NewCustomerRecord,
} from './customers.types';

const NOW = new Date('2024-06-15T12:00:00.000Z');

const home: AddressRecord = {
  line1: '1 Main St',
  city: 'Springfield',
  postalCode: '12345',
  country: 'US',
};

const office: AddressRecord = {
  line1: '200 Market St',
  line2: 'Suite 4',
  city: 'Shelbyville',
  postalCode: '67890',
  country: 'US',
};

const jane: CustomerRecord = {
  customerId: 7,
  fullName: 'Jane Doe',
  dateOfBirth: '1990-06-16',
  age: 33,
  address: [home],
};

function makeService(records: CustomerRecord[] = []) {
  const repository: jest.Mocked<CustomersRepository> = {
    listCustomers: jest.fn(async () => records),
    getCustomerById: jest.fn(
      async (customerId: number) =>
        records.find((record) => record.customerId === customerId) ?? null,
    ),
    createCustomer: jest.fn(async (customer: NewCustomerRecord) => ({
      ...customer,
      customerId: 42,
    })),
    updateCustomer: jest.fn(async (customer: CustomerRecord) => customer),
    deleteCustomerById: jest.fn(async (customerId: number) => customerId),
  };
  const config = loadAppConfig({
    CUSTOMERS_DEFAULT_PAGE_SIZE: '2',
    CUSTOMERS_MAX_PAGE_SIZE: '50',
  });
  return { service: new CustomersService(repository, config), repository };
}

describe('CustomersService', () => {
  beforeEach(() => {
    jest.useFakeTimers({ now: NOW });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('listCustomers', () => {
    const records: CustomerRecord[] = [
      { ...jane, customerId: 1, fullName: 'Alice Adams', age: 41 },
      { ...jane, customerId: 2, fullName: 'Carol Chen', age: 25 },
      { ...jane, customerId: 3, fullName: 'Bob Brown', age: 33 },
    ];

    it('rejects a page size above the configured maximum without loading', async () => {
      const { service, repository } = makeService(records);

      await expect(service.listCustomers({ pageSize: '51' })).resolves.toEqual({
        errorCode: 'BadInput',
        message: 'pageSize must be an integer between 1 and 50.',
        field: 'pageSize',
      });
      expect(repository.listCustomers).not.toHaveBeenCalled();
    });

    it('rejects unknown sort fields', async () => {
      const { service, repository } = makeService(records);

      await expect(
        service.listCustomers({ sortField: 'address' }),
      ).resolves.toMatchObject({ errorCode: 'BadInput', field: 'sortField' });
      expect(repository.listCustomers).not.toHaveBeenCalled();
    });

    it('returns zero pages for an empty store', async () => {
      const { service } = makeService([]);

      await expect(service.listCustomers({})).resolves.toEqual({
        errorCode: 'OK',
        value: {
          items: [],
          pageIndex: 1,
          pageSize: 2,
          totalRecords: 0,
          totalPages: 0,
        },
      });
    });

    it('pages the sorted collection', async () => {
      const { service } = makeService(records);

      const result = await service.listCustomers({
        pageIndex: '2',
        sortField: '-fullName',
      });

      expect(result).toEqual({
        errorCode: 'OK',
        value: {
          items: [
            {
              customerId: 1,
              fullName: 'Alice Adams',
              dateOfBirth: '1990-06-16',
              age: 33,
              address: [home],
            },
          ],
          pageIndex: 2,
          pageSize: 2,
          totalRecords: 3,
          totalPages: 2,
        },
      });
    });
  });

  describe('getCustomer', () => {
    it('rejects non-positive ids without a lookup', async () => {
      const { service, repository } = makeService([jane]);

      await expect(service.getCustomer('0')).resolves.toMatchObject({
        errorCode: 'BadInput',
        field: 'customerId',
      });
      expect(repository.getCustomerById).not.toHaveBeenCalled();
    });

    it('reports unknown ids as not found', async () => {
      const { service } = makeService([jane]);

      await expect(service.getCustomer('99')).resolves.toEqual({
        errorCode: 'NotFound',
        message: 'Customer 99 not found.',
      });
    });

    it('maps the stored record', async () => {
      const { service } = makeService([jane]);

      await expect(service.getCustomer('7')).resolves.toEqual({
        errorCode: 'OK',
        value: {
          customerId: 7,
          fullName: 'Jane Doe',
          dateOfBirth: '1990-06-16',
          age: 33,
          address: [home],
        },
      });
    });
  });

  describe('createCustomer', () => {
    it.each([
      ['2024-06-16', 'dateOfBirth cannot be in the future.'],
      ['not-a-date', 'dateOfBirth must be a valid date in YYYY-MM-DD format.'],
    ])(
      'rejects date of birth %p without persisting',
      async (dateOfBirth, message) => {
        const { service, repository } = makeService();

        await expect(
          service.createCustomer({ fullName: 'Jane Doe', dateOfBirth }),
        ).resolves.toEqual({
          errorCode: 'BadInput',
          message,
          field: 'dateOfBirth',
        });
        expect(repository.createCustomer).not.toHaveBeenCalled();
      },
    );

    it('rejects the first invalid address', async () => {
      const { service, repository } = makeService();

      await expect(
        service.createCustomer({
          fullName: 'Jane Doe',
          dateOfBirth: '1990-06-16',
          address: [home, { ...home, country: 'Germany' }],
        }),
      ).resolves.toEqual({
        errorCode: 'BadInput',
        message: 'address[1].country must be a two-letter ISO 3166-1 code.',
        field: 'address[1].country',
      });
      expect(repository.createCustomer).not.toHaveBeenCalled();
    });

    it('persists the normalized record with its age', async () => {
      const { service, repository } = makeService();

      const result = await service.createCustomer({
        fullName: '  Jane   Doe ',
        dateOfBirth: '1990-06-16',
        address: [{ ...home, country: 'us' }],
      });

      expect(repository.createCustomer).toHaveBeenCalledWith({
        fullName: 'Jane Doe',
        dateOfBirth: '1990-06-16',
        age: 33,
        address: [home],
      });
      expect(result).toEqual({
        errorCode: 'OK',
        value: {
          customerId: 42,
          fullName: 'Jane Doe',
          dateOfBirth: '1990-06-16',
          age: 33,
          address: [home],
        },
      });
    });

    it('treats a missing address list as empty', async () => {
      const { service, repository } = makeService();

      await service.createCustomer({
        fullName: 'Jane Doe',
        dateOfBirth: '1990-06-16',
      });

      expect(repository.createCustomer).toHaveBeenCalledWith(
        expect.objectContaining({ address: [] }),
      );
    });
  });

  describe('updateCustomer', () => {
    it('rejects a body id that differs from the route', async () => {
      const { service, repository } = makeService([jane]);

      await expect(
        service.updateCustomer('7', { customerId: 8, fullName: 'Jane Roe' }),
      ).resolves.toMatchObject({ errorCode: 'BadInput', field: 'customerId' });
      expect(repository.getCustomerById).not.toHaveBeenCalled();
    });

    it('reports unknown customers as not found', async () => {
      const { service, repository } = makeService([jane]);

      await expect(
        service.updateCustomer('8', { customerId: 8, fullName: 'Jane Roe' }),
      ).resolves.toEqual({
        errorCode: 'NotFound',
        message: 'Customer 8 not found.',
      });
      expect(repository.updateCustomer).not.toHaveBeenCalled();
    });

    it('replaces only the address when only the address changes', async () => {
      const { service, repository } = makeService([jane]);

      const result = await service.updateCustomer('7', {
        customerId: 7,
        address: [office],
      });

      expect(repository.updateCustomer).toHaveBeenCalledTimes(1);
      expect(repository.updateCustomer).toHaveBeenCalledWith({
        customerId: 7,
        fullName: 'Jane Doe',
        dateOfBirth: '1990-06-16',
        age: 33,
        address: [office],
      });
      expect(result).toMatchObject({
        errorCode: 'OK',
        value: { fullName: 'Jane Doe', address: [office] },
      });
    });

    it('skips persistence when nothing differs', async () => {
      const { service, repository } = makeService([jane]);

      const result = await service.updateCustomer('7', {
        customerId: 7,
        fullName: ' Jane  Doe ',
        dateOfBirth: '1990-06-16',
        address: [{ ...home, country: 'us' }],
      });

      expect(repository.updateCustomer).not.toHaveBeenCalled();
      expect(result).toEqual({
        errorCode: 'OK',
        value: {
          customerId: 7,
          fullName: 'Jane Doe',
          dateOfBirth: '1990-06-16',
          age: 33,
          address: [home],
        },
      });
    });

    it('recomputes the age when the date of birth changes', async () => {
      const { service, repository } = makeService([jane]);

      await service.updateCustomer('7', {
        customerId: 7,
        dateOfBirth: '1980-01-01',
        fullName: null,
      });

      expect(repository.updateCustomer).toHaveBeenCalledWith({
        ...jane,
        dateOfBirth: '1980-01-01',
        age: 44,
      });
    });

    it('accepts an unchanged date of birth that is now past the age limit', async () => {
      const elder: CustomerRecord = {
        customerId: 1,
        fullName: 'Old Timer',
        dateOfBirth: '1873-01-01',
        age: 149,
        address: [home],
      };
      const { service, repository } = makeService([elder]);

      const result = await service.updateCustomer('1', {
        customerId: 1,
        fullName: 'Old Timer',
        dateOfBirth: '1873-01-01T00:00:00Z',
        address: [office],
      });

      expect(repository.updateCustomer).toHaveBeenCalledTimes(1);
      expect(repository.updateCustomer).toHaveBeenCalledWith({
        ...elder,
        age: 151,
        address: [office],
      });
      expect(result).toMatchObject({
        errorCode: 'OK',
        value: { dateOfBirth: '1873-01-01', age: 151, address: [office] },
      });
    });

    it('still checks a changed date of birth against the age limit', async () => {
      const { service, repository } = makeService([jane]);

      await expect(
        service.updateCustomer('7', {
          customerId: 7,
          dateOfBirth: '1873-01-01',
        }),
      ).resolves.toEqual({
        errorCode: 'BadInput',
        message: 'dateOfBirth cannot be more than 150 years ago.',
        field: 'dateOfBirth',
      });
      expect(repository.updateCustomer).not.toHaveBeenCalled();
    });

    it('rejects a resent date of birth it cannot read', async () => {
      const { service } = makeService([jane]);

      await expect(
        service.updateCustomer('7', { customerId: 7, dateOfBirth: '16/06/1990' }),
      ).resolves.toMatchObject({ errorCode: 'BadInput', field: 'dateOfBirth' });
    });

    it('does not re-check an unchanged name', async () => {
      const legacy: CustomerRecord = { ...jane, fullName: 'J' };
      const { service, repository } = makeService([legacy]);

      const result = await service.updateCustomer('7', {
        customerId: 7,
        fullName: ' J ',
        address: [office],
      });

      expect(result).toMatchObject({
        errorCode: 'OK',
        value: { fullName: 'J', address: [office] },
      });
      expect(repository.updateCustomer).toHaveBeenCalledTimes(1);
    });

    it('stops at an invalid name before anything is written', async () => {
      const { service, repository } = makeService([jane]);

      await expect(
        service.updateCustomer('7', {
          customerId: 7,
          fullName: 'J',
          address: [office],
        }),
      ).resolves.toMatchObject({ errorCode: 'BadInput', field: 'fullName' });
      expect(repository.updateCustomer).not.toHaveBeenCalled();
    });
  });

  describe('deleteCustomer', () => {
    it('never deletes a customer that does not exist', async () => {
      const { service, repository } = makeService([jane]);

      await expect(service.deleteCustomer('12')).resolves.toEqual({
        errorCode: 'NotFound',
        message: 'Customer 12 not found.',
      });
      expect(repository.deleteCustomerById).not.toHaveBeenCalled();
    });

    it('rejects malformed ids', async () => {
      const { service, repository } = makeService([jane]);

      await expect(service.deleteCustomer('-3')).resolves.toMatchObject({
        errorCode: 'BadInput',
      });
      expect(repository.getCustomerById).not.toHaveBeenCalled();
    });

    it('returns the deleted id', async () => {
      const { service, repository } = makeService([jane]);

      await expect(service.deleteCustomer('7')).resolves.toEqual({
        errorCode: 'OK',
        value: { customerId: 7 },
      });
      expect(repository.deleteCustomerById).toHaveBeenCalledWith(7);
    });

    it('reports a record removed concurrently as not found', async () => {
      const { service, repository } = makeService([jane]);
      repository.deleteCustomerById.mockResolvedValueOnce(null);

      await expect(service.deleteCustomer('7')).resolves.toEqual({
        errorCode: 'NotFound',
        message: 'Customer 7 not found.',
      });
    });
  });
});
