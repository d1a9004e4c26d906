import path from 'path';
import { fileURLToPath } from 'url';
import { Document, render, scanPlaceholders } from '../src';

const folder = path.dirname(fileURLToPath(import.meta.url));
const templatePath = process.argv[2] ?? path.join(folder, 'template.docx');

const template = await Document.fromFile(templatePath);
console.log('Placeholders:', scanPlaceholders(template).join(', '));

const doc = render(
  template,
  { name: 'Ava Martin', city: 'Montréal', title: 'Research Fellow' },
  { Name: 'name', City: 'city', Title: 'title' }
);

await doc.toFile(path.join(folder, 'output.docx'));
console.log('Saved templated document to output.docx');
