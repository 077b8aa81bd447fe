import * as fs from 'fs';
import * as path from 'path';
import { addFeed, addOutline, createDocument, createOutline, setHeadField } from '../src/model/document';
import { toXml } from '../src/serializers/opmlSerializer';
import { OpmlDocument } from '../src/types/opml';

const topics = ['Programming', 'Science', 'News', 'Music', 'Cooking', 'Travel', 'Design', 'Games'];
const adjectives = ['Daily', 'Weekly', 'Open', 'Quiet', 'Loud', 'Tiny', 'Curious', 'Late Night'];
const nouns = ['Digest', 'Notes', 'Journal', 'Dispatch', 'Letters', 'Review', 'Log', 'Gazette'];

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

function slug(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '-');
}

function generateDocument(numGroups: number, feedsPerGroup: number): OpmlDocument {
  const document = createDocument();
  setHeadField(document, 'title', 'Generated subscriptions');
  setHeadField(document, 'dateCreated', new Date().toUTCString());

  for (let g = 0; g < numGroups; g++) {
    const topic = pick(topics);
    const group = addOutline(document.body, createOutline(`${topic} ${g + 1}`));
    for (let f = 0; f < feedsPerGroup; f++) {
      const name = `${pick(adjectives)} ${pick(nouns)} & Co`;
      const feed = addFeed(group, name, `https://example.com/${slug(topic)}/${g}-${f}/feed.xml`);
      feed.type = 'rss';
      feed.htmlUrl = `https://example.com/${slug(topic)}/${g}-${f}/`;
    }
  }

  return document;
}

const NUM_GROUPS = 200;
const FEEDS_PER_GROUP = 25;
const outputPath = path.join(__dirname, 'sample.opml');

fs.writeFileSync(outputPath, toXml(generateDocument(NUM_GROUPS, FEEDS_PER_GROUP), { declaration: true, indent: '  ' }), 'utf-8');
console.log(`Generated OPML file with ${NUM_GROUPS * FEEDS_PER_GROUP} feeds at: ${outputPath}`);
