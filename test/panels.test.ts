import { describe, expect, it, vi } from 'vitest';

import { mapDisplay } from '../src/core/mapper.js';
import { IndicatorDriver } from '../src/display/indicatorDriver.js';
import { NodePanelDriver } from '../src/display/nodePanelDriver.js';
import { HardwareClaimFailure } from '../src/errors.js';
import type { GpioChip, OutputLine } from '../src/hardware/gpio.js';
import { SimulatedGpioChip } from '../src/hardware/simulated.js';

const noWait = async () => undefined;
const panelPins = new Map([
  ['c1', 17],
  ['c2', 27],
  ['q1', 24]
]);

function directives(nodeActive: Record<string, boolean>, classicalActive = false, quantumActive = false) {
  return mapDisplay({ classicalActive, quantumActive, nodeActive });
}

describe('IndicatorDriver', () => {
  it('drives A for classical and B for quantum activity', async () => {
    const chip = new SimulatedGpioChip();
    const driver = await IndicatorDriver.claim(chip, { a: 17, b: 27 });
    await driver.apply(directives({}, true, false));
    expect(chip.state(17)).toBe(true);
    expect(chip.state(27)).toBe(false);
    await driver.apply(directives({}, false, true));
    expect(chip.state(17)).toBe(false);
    expect(chip.state(27)).toBe(true);
  });

  it('rewrites both lines on every apply', async () => {
    const chip = new SimulatedGpioChip();
    const driver = await IndicatorDriver.claim(chip, { a: 17, b: 27 });
    await driver.apply(directives({}, true, true));
    await driver.apply(directives({}, true, true));
    expect(chip.writes).toEqual([
      { pin: 17, on: true },
      { pin: 27, on: true },
      { pin: 17, on: true },
      { pin: 27, on: true }
    ]);
  });

  it('turns both lights off and releases them on shutdown', async () => {
    const chip = new SimulatedGpioChip();
    const driver = await IndicatorDriver.claim(chip, { a: 17, b: 27 });
    await driver.apply(directives({}, true, true));
    await driver.shutdown();
    expect(chip.writes.slice(2, 4)).toEqual([
      { pin: 17, on: false },
      { pin: 27, on: false }
    ]);
    expect(chip.claimedPins()).toEqual([]);
  });

  it('gives back line A when line B cannot be claimed', async () => {
    const release = vi.fn(async () => undefined);
    const chip: GpioChip = {
      label: 'flaky',
      claimOutput: async (pin: number): Promise<OutputLine> => {
        if (pin === 27) {
          throw new HardwareClaimFailure('flaky', 'GPIO 27 is already claimed by another process', 27);
        }
        return { pin, write: async () => undefined, release };
      },
      close: async () => undefined
    };
    await expect(IndicatorDriver.claim(chip, { a: 17, b: 27 })).rejects.toBeInstanceOf(HardwareClaimFailure);
    expect(release).toHaveBeenCalledTimes(1);
  });
});

describe('NodePanelDriver', () => {
  it('lights exactly the active nodes', async () => {
    const chip = new SimulatedGpioChip();
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep: noWait });
    await panel.apply(directives({ c1: true, c2: false, q1: true }));
    expect(chip.state(17)).toBe(true);
    expect(chip.state(27)).toBe(false);
    expect(chip.state(24)).toBe(true);
  });

  it('treats nodes missing from the directive as off', async () => {
    const chip = new SimulatedGpioChip();
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep: noWait });
    await panel.apply(directives({ c1: true }));
    await panel.apply(directives({}));
    expect(panel.isOn('c1')).toBe(false);
    expect(chip.state(17)).toBe(false);
  });

  it('ignores nodes it has no light for', async () => {
    const chip = new SimulatedGpioChip();
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep: noWait });
    await panel.apply(directives({ c9: true }));
    expect(chip.writes).toEqual([]);
  });

  it('writes only lines whose state changed', async () => {
    const chip = new SimulatedGpioChip();
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep: noWait });
    await panel.apply(directives({ c1: true, c2: false }));
    await panel.apply(directives({ c1: true, c2: true }));
    expect(chip.writes).toEqual([
      { pin: 17, on: true },
      { pin: 27, on: true }
    ]);
  });

  it('self-test lights every output once in order and turns them off in reverse', async () => {
    const chip = new SimulatedGpioChip();
    const sleep = vi.fn(async (_ms: number) => undefined);
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep });
    await panel.selfTest({ onStepMs: 300, offStepMs: 200 });
    expect(chip.writes).toEqual([
      { pin: 17, on: true },
      { pin: 27, on: true },
      { pin: 24, on: true },
      { pin: 24, on: false },
      { pin: 27, on: false },
      { pin: 17, on: false }
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([300, 300, 300, 200, 200, 200]);
    expect(panel.nodes.map((node) => panel.isOn(node))).toEqual([false, false, false]);
  });

  it('drives every light off and releases all lines on shutdown', async () => {
    const chip = new SimulatedGpioChip();
    const panel = await NodePanelDriver.claim(chip, panelPins, { sleep: noWait });
    await panel.apply(directives({ c1: true, c2: true, q1: true }));
    await panel.shutdown();
    expect(chip.claimedPins()).toEqual([]);
    for (const pin of [17, 27, 24]) {
      expect(chip.writes.filter((write) => write.pin === pin).at(-1)).toEqual({ pin, on: false });
    }
  });

  it('releases lines already claimed when a later claim fails', async () => {
    const inner = new SimulatedGpioChip();
    const chip: GpioChip = {
      label: 'partial',
      claimOutput: async (pin: number) => {
        if (pin === 24) {
          throw new HardwareClaimFailure('partial', 'GPIO device absent', pin);
        }
        return inner.claimOutput(pin);
      },
      close: () => inner.close()
    };
    await expect(NodePanelDriver.claim(chip, panelPins, { sleep: noWait })).rejects.toThrow('GPIO device absent');
    expect(inner.claimedPins()).toEqual([]);
  });
});
