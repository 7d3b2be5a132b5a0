import { ConfigService } from '@nestjs/config';
import { delayedFetch } from '../testing/fetch-stubs';
import { FakeSwitchPortDirectory } from './fake-switch-port.directory';
import { DIRECTORY_NOT_FOUND_MESSAGE, HttpSwitchPortDirectory } from './http-switch-port.directory';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('HttpSwitchPortDirectory', () => {
  const config = new ConfigService({ DIRECTORY_BASE_URL: 'http://directory.test/v1/' });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps the directory body to a successful lookup', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse({ switch_number: 'SW-17', port_number: 'Gi1/0/24' }));
    const directory = new HttpSwitchPortDirectory(config);

    const result = await directory.lookup('0101901234');

    expect(String(fetchSpy.mock.calls[0][0])).toBe('http://directory.test/v1/switch-port/0101901234');
    expect(result).toEqual({ switchNumber: 'SW-17', portNumber: 'Gi1/0/24', success: true, message: 'Success' });
  });

  it('reports a missing mapping as an unsuccessful lookup', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ detail: 'not found' }, 404));
    const directory = new HttpSwitchPortDirectory(config);

    const result = await directory.lookup('0101901234');

    expect(result).toEqual({ switchNumber: '', portNumber: '', success: false, message: DIRECTORY_NOT_FOUND_MESSAGE });
  });

  it('throws on other error statuses', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({}, 502));
    const directory = new HttpSwitchPortDirectory(config);

    await expect(directory.lookup('0101901234')).rejects.toThrow('Directory lookup returned status 502');
  });

  it('throws when the body lacks switch or port', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ switch_number: 'SW-17' }));
    const directory = new HttpSwitchPortDirectory(config);

    await expect(directory.lookup('0101901234')).rejects.toThrow('Directory lookup returned an unexpected body');
  });

  it('releases the body of a 404 response', async () => {
    const response = jsonResponse({ detail: 'not found' }, 404);
    jest.spyOn(global, 'fetch').mockResolvedValue(response);

    await new HttpSwitchPortDirectory(config).lookup('0101901234');

    expect(response.bodyUsed).toBe(true);
  });

  it('releases the body of an error response', async () => {
    const response = jsonResponse({ detail: 'bad gateway' }, 502);
    jest.spyOn(global, 'fetch').mockResolvedValue(response);

    await expect(new HttpSwitchPortDirectory(config).lookup('0101901234')).rejects.toThrow();
    expect(response.bodyUsed).toBe(true);
  });

  it('rejects when the directory does not answer within the timeout', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(delayedFetch(5000, () => jsonResponse({ switch_number: 'SW-17', port_number: 'Gi1/0/24' })));
    const directory = new HttpSwitchPortDirectory(
      new ConfigService({ DIRECTORY_BASE_URL: 'http://directory.test', DIRECTORY_TIMEOUT_MS: '20' }),
    );

    await expect(directory.lookup('0101901234')).rejects.toMatchObject({ name: 'TimeoutError' });
  });

  it('keeps the default timeout when DIRECTORY_TIMEOUT_MS is blank', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(delayedFetch(30, () => jsonResponse({ switch_number: 'SW-17', port_number: 'Gi1/0/24' })));
    const directory = new HttpSwitchPortDirectory(
      new ConfigService({ DIRECTORY_BASE_URL: 'http://directory.test', DIRECTORY_TIMEOUT_MS: '' }),
    );

    await expect(directory.lookup('0101901234')).resolves.toMatchObject({ switchNumber: 'SW-17', success: true });
  });
});

describe('FakeSwitchPortDirectory', () => {
  it('returns the fixed mapping for any identifier', async () => {
    await expect(new FakeSwitchPortDirectory().lookup('3112995678')).resolves.toEqual({
      switchNumber: 'SW001',
      portNumber: 'P001',
      success: true,
      message: 'Success',
    });
  });
});
