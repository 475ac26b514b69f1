import { UIViewController, UIView } from "UIKit";
import { BaseView } from "ExternalFramework";

type BaseController = UIViewController;

export class AliasedInheritanceController extends BaseController {}

export class ProfileScreen extends UIViewController {}

export class MyCustomView extends BaseView {}

export const placeholder: UIView | undefined = undefined;
