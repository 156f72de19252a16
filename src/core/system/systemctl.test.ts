import { describe, it, expect } from 'vitest';
import { parseUnitFileNames, Systemctl } from './systemctl';
import { FakeCommandRunner, result } from '../../test-utils/fake-runner';

const UNIT_FILES = [
  'cpuGovernor.service                  enabled         enabled',
  'cron.service                         enabled         enabled',
  'getty@.service                       disabled        enabled',
].join('\n');

describe('parseUnitFileNames', () => {
  it('takes the first column', () => {
    expect(parseUnitFileNames(UNIT_FILES)).toEqual(['cpuGovernor.service', 'cron.service', 'getty@.service']);
  });
});

describe('Systemctl', () => {
  it('matches unit files exactly', async () => {
    const runner = new FakeCommandRunner().on('systemctl list-unit-files --no-legend --no-pager', result(0, UNIT_FILES));
    const systemctl = new Systemctl(runner);

    expect(await systemctl.hasUnitFile('cpuGovernor.service')).toBe(true);
    expect(await systemctl.hasUnitFile('cpugovernor.service')).toBe(false);
    expect(await systemctl.hasUnitFile('cpuGovernor')).toBe(false);
  });

  it('reports no unit file when listing fails', async () => {
    const runner = new FakeCommandRunner().on('systemctl list-unit-files --no-legend --no-pager', result(1));

    expect(await new Systemctl(runner).hasUnitFile('cpuGovernor.service')).toBe(false);
  });

  it('maps is-active exit codes', async () => {
    const runner = new FakeCommandRunner()
      .on('systemctl is-active --quiet cpuGovernor.service', result(0))
      .on('systemctl is-active --quiet other.service', result(3));
    const systemctl = new Systemctl(runner);

    expect(await systemctl.isActive('cpuGovernor.service')).toBe(true);
    expect(await systemctl.isActive('other.service')).toBe(false);
  });

  it('issues the unit lifecycle commands', async () => {
    const runner = new FakeCommandRunner();
    const systemctl = new Systemctl(runner);

    await systemctl.stop('cpuGovernor.service');
    await systemctl.daemonReload();
    await systemctl.enable('cpuGovernor.service');
    await systemctl.restart('cpuGovernor.service');

    expect(runner.commandLines()).toEqual([
      'systemctl stop cpuGovernor.service',
      'systemctl daemon-reload',
      'systemctl enable cpuGovernor.service',
      'systemctl restart cpuGovernor.service',
    ]);
  });

  it('reads the journal tail', async () => {
    const runner = new FakeCommandRunner().on(
      'journalctl -u cpuGovernor.service -n 200 --no-pager -o cat',
      result(0, 'governor: cannot open /sys/devices/system/cpu\n')
    );

    expect(await new Systemctl(runner).journal('cpuGovernor.service', 200)).toBe(
      'governor: cannot open /sys/devices/system/cpu\n'
    );
  });
});
