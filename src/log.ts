import { Logger } from 'tslog';

const parsedLevel = Number.parseInt(process.env.LOG_LEVEL ?? '', 10);

const log = new Logger({
    name: 'mediadrop',
    type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
    minLevel: Number.isFinite(parsedLevel) ? parsedLevel : 3,
    stylePrettyLogs: true,
    prettyLogTimeZone: 'local'
});

export default log;
