/**
 * PairBuilder
 *
 * Projects discovery state into (source, target) comparison pairs. The
 * returned iterables are lazy and restartable: every iteration walks the
 * already-materialized discovery again and yields the same sequence.
 *
 * Order: context (discovery order) -> target locale (input order) -> artifact name.
 */

import * as path from 'path';
import { type LocalePathResolver, pageFileName } from '../locale/LocalePathResolver.js';
import type { Artifact, ComparisonPair, CrawlDiscovery, DeviceDiscovery, LocaleSet, LocaleVariant } from '../types.js';

export class PairBuilder {
    static crawl(
        discovery: CrawlDiscovery,
        locales: LocaleSet,
        resolver: LocalePathResolver
    ): Iterable<ComparisonPair> {
        return {
            *[Symbol.iterator]() {
                let sequence = 0;
                for (const page of discovery.pages) {
                    const artifactName = `${pageFileName(page)}.png`;
                    const source = resolver.variant(page, locales.sourceLocale);

                    for (const targetLocale of locales.targetLocales) {
                        yield Object.freeze<ComparisonPair>({
                            sequence: sequence++,
                            contextKey: page,
                            targetLocale,
                            artifactName,
                            source: pageArtifact(source, artifactName),
                            target: pageArtifact(resolver.variant(page, targetLocale), artifactName)
                        });
                    }
                }
            }
        };
    }

    static device(
        discovery: DeviceDiscovery,
        locales: LocaleSet,
        resolver: LocalePathResolver
    ): Iterable<ComparisonPair> {
        return {
            *[Symbol.iterator]() {
                let sequence = 0;
                for (const group of discovery.groups) {
                    for (const targetLocale of locales.targetLocales) {
                        // A group without this locale has nothing to pair with; never borrow another device's run.
                        const present = group.targetFiles.get(targetLocale);
                        if (!present) continue;

                        for (const fileName of group.matchSet) {
                            if (!present.has(fileName)) continue;

                            const canonical = `${group.key}/${fileName}`;
                            yield Object.freeze<ComparisonPair>({
                                sequence: sequence++,
                                contextKey: group.key,
                                targetLocale,
                                artifactName: fileName,
                                source: {
                                    kind: 'file',
                                    path: path.join(discovery.root, resolver.resolve(canonical, locales.sourceLocale)),
                                    locale: locales.sourceLocale,
                                    name: fileName
                                },
                                target: {
                                    kind: 'file',
                                    path: path.join(discovery.root, resolver.resolve(canonical, targetLocale)),
                                    locale: targetLocale,
                                    name: fileName
                                }
                            });
                        }
                    }
                }
            }
        };
    }
}

function pageArtifact({ address, locale }: LocaleVariant, name: string): Artifact {
    return { kind: 'page', address, locale, name };
}
