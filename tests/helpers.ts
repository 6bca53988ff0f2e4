import fs from 'fs';
import os from 'os';
import path from 'path';

export const FIXTURES = path.join(__dirname, 'fixtures');

export function fixture(name: string): string {
    return path.join(FIXTURES, name);
}

export function writeTempFile(name: string, content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'aq-lookup-'));
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
}
