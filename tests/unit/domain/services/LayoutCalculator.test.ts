import {
    buildLayout,
    composeFixedSlot,
    computeCoverCrop,
    splitIntoSlides,
} from '../../../../src/domain/services/LayoutCalculator';

describe('LayoutCalculator', () => {
    describe('buildLayout', () => {
        test('should space five phrases evenly across 70% of a 1920px canvas', () => {
            const plan = buildLayout(['a', 'b', 'c', 'd', 'e'], 1920, 12);

            expect(plan.entries.map(e => e.y)).toEqual([512, 736, 960, 1184, 1408]);
            expect(plan.totalDurationSeconds).toBe(12);
        });

        test('should use the requested band ratio', () => {
            const plan = buildLayout(['one', 'two', 'three'], 1350, 1, 0.8);

            expect(plan.entries.map(e => e.y)).toEqual([405, 675, 945]);
        });

        test('should keep every row visible for the whole duration without fades', () => {
            const plan = buildLayout(['a', 'b'], 1920, 7.5);

            for (const entry of plan.entries) {
                expect(entry.startSeconds).toBe(0);
                expect(entry.durationSeconds).toBe(7.5);
                expect(entry.fadeIn).toBe(false);
                expect(entry.fadeOut).toBe(false);
            }
        });

        test('should preserve phrase order', () => {
            const plan = buildLayout(['first', 'second', 'third'], 1920, 5);
            expect(plan.entries.map(e => e.text)).toEqual(['first', 'second', 'third']);
        });

        test.each([1, 2, 3, 4, 5, 6])('should keep %i rows increasing, evenly spaced and inside the middle 80%%', (count) => {
            const phrases = Array.from({ length: count }, (_, i) => `phrase ${i}`);

            for (const ratio of [0.7, 0.8]) {
                const ys = buildLayout(phrases, 1920, 10, ratio).entries.map(e => e.y);

                expect(ys).toHaveLength(count);
                for (const y of ys) {
                    expect(y).toBeGreaterThanOrEqual(192);
                    expect(y).toBeLessThanOrEqual(1728);
                }
                for (let i = 1; i < ys.length; i++) {
                    expect(ys[i]).toBeGreaterThan(ys[i - 1]);
                }
                const gaps = ys.slice(1).map((y, i) => y - ys[i]);
                for (const gap of gaps) {
                    expect(Math.abs(gap - gaps[0])).toBeLessThanOrEqual(1);
                }
            }
        });

        test('should reject an empty phrase list', () => {
            expect(() => buildLayout([], 1920, 10)).toThrow('Cannot lay out an empty phrase list');
        });

        test('should reject band ratios outside (0, 0.8]', () => {
            expect(() => buildLayout(['a'], 1920, 10, 0.9)).toThrow('bandRatio must be in (0, 0.8], got 0.9');
            expect(() => buildLayout(['a'], 1920, 10, 0)).toThrow('bandRatio must be in (0, 0.8], got 0');
        });

        test('should reject a non-positive duration', () => {
            expect(() => buildLayout(['a'], 1920, 0)).toThrow('durationSeconds must be positive, got 0');
        });
    });

    describe('composeFixedSlot', () => {
        test('should give each phrase its own slot centred on the canvas', () => {
            const plan = composeFixedSlot(['a', 'b', 'c'], 6, 1920);

            expect(plan.totalDurationSeconds).toBe(18);
            expect(plan.entries).toEqual([
                { text: 'a', y: 960, startSeconds: 0, durationSeconds: 6, fadeIn: false, fadeOut: true },
                { text: 'b', y: 960, startSeconds: 6, durationSeconds: 6, fadeIn: true, fadeOut: true },
                { text: 'c', y: 960, startSeconds: 12, durationSeconds: 6, fadeIn: true, fadeOut: true },
            ]);
        });

        test('should never show two phrases at once', () => {
            const plan = composeFixedSlot(['a', 'b', 'c', 'd', 'e'], 6, 1920);

            for (let i = 1; i < plan.entries.length; i++) {
                const previous = plan.entries[i - 1];
                expect(plan.entries[i].startSeconds).toBe(previous.startSeconds + previous.durationSeconds);
            }
        });

        test('should reject a non-positive slot length', () => {
            expect(() => composeFixedSlot(['a'], 0, 1920)).toThrow('slotSeconds must be positive, got 0');
        });
    });

    describe('computeCoverCrop', () => {
        test('should scale landscape footage up to cover a portrait frame and crop the centre', () => {
            expect(computeCoverCrop({ width: 1920, height: 1080 }, { width: 1080, height: 1920 })).toEqual({
                scaledWidth: 3414,
                scaledHeight: 1920,
                x: 1167,
                y: 0,
                width: 1080,
                height: 1920,
            });
        });

        test('should scale a same-aspect source without cropping', () => {
            expect(computeCoverCrop({ width: 720, height: 1280 }, { width: 1080, height: 1920 })).toEqual({
                scaledWidth: 1080,
                scaledHeight: 1920,
                x: 0,
                y: 0,
                width: 1080,
                height: 1920,
            });
        });

        test('should crop the sides of a square source', () => {
            const crop = computeCoverCrop({ width: 1000, height: 1000 }, { width: 1080, height: 1920 });

            expect(crop.scaledWidth).toBe(1920);
            expect(crop.scaledHeight).toBe(1920);
            expect(crop.x).toBe(420);
            expect(crop.y).toBe(0);
        });

        test('should reject an empty source', () => {
            expect(() => computeCoverCrop({ width: 0, height: 1080 }, { width: 1080, height: 1920 }))
                .toThrow('Invalid source size 0x1080');
        });
    });

    describe('splitIntoSlides', () => {
        test('should split six phrases into two slides of three', () => {
            expect(splitIntoSlides(['a', 'b', 'c', 'd', 'e', 'f'], 3)).toEqual([['a', 'b', 'c'], ['d', 'e', 'f']]);
        });

        test('should put the remainder on the last slide', () => {
            expect(splitIntoSlides(['a', 'b', 'c', 'd', 'e'], 3)).toEqual([['a', 'b', 'c'], ['d', 'e']]);
        });

        test('should reject a non-positive slide size', () => {
            expect(() => splitIntoSlides(['a'], 0)).toThrow('perSlide must be a positive integer, got 0');
        });
    });
});
