export { InputMap } from "./input-map.js";
export { Action } from "./action.js";
export { ActionSet, ROOT_ELEMENT, ACTION_SET_ELEMENT } from "./action-set.js";
export { isValidName, asValidName } from "./naming.js";
export { parseXml, buildXml, childElements, type XmlElement } from "./xml.js";
