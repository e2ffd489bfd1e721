import { PairingCodeGenerator } from './pairing-code.generator';

describe('PairingCodeGenerator', () => {
  let generator: PairingCodeGenerator;

  beforeEach(() => {
    generator = new PairingCodeGenerator();
  });

  it('should produce six-digit numeric candidates', () => {
    for (let i = 0; i < 200; i++) {
      expect(generator.nextCandidate()).toMatch(/^\d{6}$/);
    }
  });

  it('should return the first candidate that is not taken', async () => {
    jest
      .spyOn(generator, 'nextCandidate')
      .mockReturnValueOnce('111111')
      .mockReturnValueOnce('222222');
    const isTaken = jest.fn(async (candidate: string) => candidate === '111111');

    await expect(generator.generate(isTaken)).resolves.toBe('222222');
    expect(isTaken).toHaveBeenCalledTimes(2);
  });

  it('should give up after five taken candidates and return the last one', async () => {
    const candidates = ['100000', '200000', '300000', '400000', '500000'];
    const spy = jest.spyOn(generator, 'nextCandidate');
    candidates.forEach((candidate) => spy.mockReturnValueOnce(candidate));
    const isTaken = jest.fn(async () => true);

    await expect(generator.generate(isTaken)).resolves.toBe('500000');
    expect(isTaken).toHaveBeenCalledTimes(5);
    expect(spy).toHaveBeenCalledTimes(5);
  });
});
