import { describe, it, expect } from 'vitest';
import { DpkgPackageManager, parseContentListing } from './dpkg';
import { FakeCommandRunner, result } from '../../test-utils/fake-runner';

const DEB = '/tmp/cpuGovernor-install-x/cpuGovernor_0.1.2.deb';

const LISTING = [
  'drwxr-xr-x root/root         0 2026-03-01 10:00 ./',
  'drwxr-xr-x root/root         0 2026-03-01 10:00 ./lib/systemd/system/',
  '-rw-r--r-- root/root       312 2026-03-01 10:00 ./lib/systemd/system/cpuGovernor.service',
  '-rwxr-xr-x root/root     40960 2026-03-01 10:00 ./usr/bin/cpu-governor',
  '',
].join('\n');

describe('parseContentListing', () => {
  it('takes the path column', () => {
    expect(parseContentListing(LISTING)).toEqual([
      './',
      './lib/systemd/system/',
      './lib/systemd/system/cpuGovernor.service',
      './usr/bin/cpu-governor',
    ]);
  });

  it('returns nothing for empty output', () => {
    expect(parseContentListing('\n\n')).toEqual([]);
  });
});

describe('DpkgPackageManager', () => {
  it('verifies an archive with dpkg-deb --info', async () => {
    const runner = new FakeCommandRunner().on(`dpkg-deb --info ${DEB}`, result(2, '', 'not a Debian format archive'));
    const dpkg = new DpkgPackageManager(runner);

    expect(await dpkg.verifyArchive(DEB)).toBe(false);
    expect(runner.commandLines()).toEqual([`dpkg-deb --info ${DEB}`]);
  });

  it('reads a control field', async () => {
    const runner = new FakeCommandRunner().on(`dpkg-deb -f ${DEB} Package`, result(0, 'cpugovernor\n'));

    expect(await new DpkgPackageManager(runner).readField(DEB, 'Package')).toBe('cpugovernor');
  });

  it('returns null for an empty or unreadable field', async () => {
    const runner = new FakeCommandRunner()
      .on(`dpkg-deb -f ${DEB} Package`, result(0, '\n'))
      .on(`dpkg-deb -f ${DEB} Version`, result(2));
    const dpkg = new DpkgPackageManager(runner);

    expect(await dpkg.readField(DEB, 'Package')).toBeNull();
    expect(await dpkg.readField(DEB, 'Version')).toBeNull();
  });

  it('lists archive contents', async () => {
    const runner = new FakeCommandRunner().on(`dpkg-deb -c ${DEB}`, result(0, LISTING));

    expect(await new DpkgPackageManager(runner).listContents(DEB)).toContain('./lib/systemd/system/cpuGovernor.service');
  });

  it('queries the installed version', async () => {
    const runner = new FakeCommandRunner()
      .on('dpkg-query -W --showformat=${Version}\\n cpugovernor', result(0, '0.1.1\n'))
      .on('dpkg-query -W --showformat=${Version}\\n missing', result(1, '', 'dpkg-query: no packages found matching missing'));
    const dpkg = new DpkgPackageManager(runner);

    expect(await dpkg.installedVersion('cpugovernor')).toBe('0.1.1');
    expect(await dpkg.installedVersion('missing')).toBeNull();
  });

  it('runs dpkg and apt-get with the terminal attached', async () => {
    const runner = new FakeCommandRunner();
    const dpkg = new DpkgPackageManager(runner);

    await dpkg.install(DEB);
    await dpkg.update();
    await dpkg.fixBroken();

    expect(runner.commandLines()).toEqual([`dpkg -i ${DEB}`, 'apt-get update -y', 'apt-get -f install -y']);
    expect(runner.calls.every((call) => call.options.inheritOutput === true)).toBe(true);
  });
});
