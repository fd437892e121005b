import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('prefix-cache');

export default LibLogger;
